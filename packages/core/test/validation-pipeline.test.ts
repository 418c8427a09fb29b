import { expect } from 'chai';
import { toBeHex } from 'ethers';
import { DirectVerifyAuthorizer } from '../src/authorizers';
import { GroupLedger, InMemoryEscrow, InMemoryGroupDepositStore } from '../src/group-ledger';
import { ValidationPipeline } from '../src/validation-pipeline';
import { InMemoryAuditLogger } from '../src/types';
import { StubVerifier, makeProof, newProofOp, ALICE } from './helpers';

describe('ValidationPipeline', () => {
  const groupId = 5n;
  let verifier: StubVerifier;
  let ledger: GroupLedger;
  let audit: InMemoryAuditLogger;
  let pipeline: ValidationPipeline;

  beforeEach(async () => {
    verifier = new StubVerifier();
    verifier.addGroup(groupId, 100n);
    audit = new InMemoryAuditLogger();
    ledger = new GroupLedger(new InMemoryGroupDepositStore(), new InMemoryEscrow());
    await ledger.deposit(groupId, 1_000n);
    pipeline = new ValidationPipeline(ledger, new DirectVerifyAuthorizer(verifier), audit);
  });

  it('approves and encodes the context', async () => {
    const op = newProofOp(ALICE, 0n, groupId, makeProof(ALICE, 0n, groupId));
    const outcome = await pipeline.validate(op, 100n);

    expect(outcome).to.deep.equal({
      status: 'approved',
      context: toBeHex(groupId, 32),
      decodedContext: { groupId },
    });
    const entry = audit.last('validate');
    expect(entry?.actor).to.equal('validation-pipeline:direct');
    expect(entry?.success).to.equal(true);
    expect(entry?.target).to.equal('5');
  });

  it('never mutates the ledger', async () => {
    const op = newProofOp(ALICE, 0n, groupId, makeProof(ALICE, 0n, groupId));
    await pipeline.validate(op, 100n);
    expect(await ledger.balanceOf(groupId)).to.equal(1_000n);
  });

  it('checks the balance before touching the verifier', async () => {
    const op = newProofOp(ALICE, 0n, groupId, makeProof(ALICE, 0n, groupId));
    expect(await pipeline.validate(op, 1_001n)).to.deep.equal({
      status: 'rejected',
      reason: 'INSUFFICIENT_BALANCE',
    });
    expect(verifier.verifyCalls).to.equal(0);
  });

  it('accepts a pre-fund equal to the balance', async () => {
    const op = newProofOp(ALICE, 0n, groupId, makeProof(ALICE, 0n, groupId));
    expect(await pipeline.validate(op, 1_000n)).to.have.property('status', 'approved');
  });

  it('rejects groups that were never funded', async () => {
    const op = newProofOp(ALICE, 0n, 6n, makeProof(ALICE, 0n, 6n));
    expect(await pipeline.validate(op, 1n)).to.deep.equal({ status: 'rejected', reason: 'INSUFFICIENT_BALANCE' });
  });

  it('turns undecodable payloads into MALFORMED_PAYLOAD', async () => {
    const outcome = await pipeline.validate({ sender: ALICE, nonce: 0n, paymasterData: '0x0102' }, 1n);
    expect(outcome).to.deep.equal({ status: 'rejected', reason: 'MALFORMED_PAYLOAD' });

    const entry = audit.last('validate');
    expect(entry?.success).to.equal(false);
    expect(entry?.metadata).to.have.property('reason', 'MALFORMED_PAYLOAD');
  });

  it('rejects a malformed sender', async () => {
    const op = newProofOp(ALICE, 0n, groupId, makeProof(ALICE, 0n, groupId));
    const outcome = await pipeline.validate({ ...op, sender: '0x1234' }, 1n);
    expect(outcome).to.deep.equal({ status: 'rejected', reason: 'MALFORMED_PAYLOAD' });
  });

  it('rejects negative nonces and pre-funds', async () => {
    const op = newProofOp(ALICE, 0n, groupId, makeProof(ALICE, 0n, groupId));
    expect(await pipeline.validate({ ...op, nonce: -1n }, 1n)).to.have.property('reason', 'MALFORMED_PAYLOAD');
    expect(await pipeline.validate(op, -1n)).to.have.property('reason', 'MALFORMED_PAYLOAD');
  });

  it('passes authorizer rejections through', async () => {
    const op = newProofOp(ALICE, 1n, groupId, makeProof(ALICE, 0n, groupId));
    expect(await pipeline.validate(op, 1n)).to.deep.equal({
      status: 'rejected',
      reason: 'INVALID_MESSAGE_BINDING',
    });
  });

  it('exposes the authorizer kind', () => {
    expect(pipeline.kind).to.equal('direct');
  });
});
