import { expect } from 'chai';
import { MembershipPolicy, SemaphoreMembershipChecker } from '../src/policy';
import { SponsorAccessError } from '../src/errors';
import { StubVerifier, makeProof, ADMIN, ALICE, BOB, PAYMASTER } from './helpers';

describe('MembershipPolicy', () => {
  const groupId = 5n;
  let verifier: StubVerifier;
  let policy: MembershipPolicy;

  beforeEach(() => {
    verifier = new StubVerifier();
    verifier.addGroup(groupId, 100n);
    policy = new MembershipPolicy(new SemaphoreMembershipChecker(verifier, groupId), ADMIN);
  });

  it('lets only the owner set the target, once', () => {
    expect(() => policy.setTarget(ALICE, PAYMASTER)).to.throw(SponsorAccessError, /owner/);
    expect(policy.getTarget()).to.equal(null);

    policy.setTarget(ADMIN, PAYMASTER);
    expect(policy.getTarget()).to.equal(PAYMASTER);

    expect(() => policy.setTarget(ADMIN, BOB)).to.throw(SponsorAccessError, /already set/);
  });

  it('refuses enforcement by anyone but the target', async () => {
    policy.setTarget(ADMIN, PAYMASTER);
    try {
      await policy.enforce(BOB, ALICE, { groupId, proof: makeProof(ALICE, 0n, groupId) });
      expect.fail('should have thrown');
    } catch (error) {
      expect(error).to.be.instanceOf(SponsorAccessError);
      expect(error).to.have.property('code', 'TARGET_ONLY');
    }
  });

  it('refuses enforcement before a target is set', async () => {
    try {
      await policy.enforce(PAYMASTER, ALICE, { groupId, proof: makeProof(ALICE, 0n, groupId) });
      expect.fail('should have thrown');
    } catch (error) {
      expect(error).to.have.property('code', 'TARGET_ONLY');
    }
  });

  it('checks evidence against its group', async () => {
    policy.setTarget(ADMIN, PAYMASTER);
    const proof = makeProof(ALICE, 0n, groupId);

    expect(await policy.enforce(PAYMASTER, ALICE, { groupId, proof })).to.equal(true);
    expect(await policy.enforce(PAYMASTER, ALICE, { groupId: 6n, proof })).to.equal(false);
    expect(await policy.enforce(PAYMASTER, ALICE, { groupId, proof: { ...proof, scope: 6n } })).to.equal(false);

    verifier.verdict = () => false;
    expect(await policy.enforce(PAYMASTER, ALICE, { groupId, proof })).to.equal(false);
  });
});
