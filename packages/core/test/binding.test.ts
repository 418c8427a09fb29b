import { expect } from 'chai';
import { AbiCoder, keccak256 } from 'ethers';
import { computeMessageBinding, computeGroupScope, computeEpochScope } from '../src/binding';
import { ALICE, BOB } from './helpers';

describe('Proof bindings', () => {
  const abi = AbiCoder.defaultAbiCoder();

  it('should hash the ABI-encoded sender and nonce', () => {
    const expected = BigInt(keccak256(abi.encode(['address', 'uint256'], [ALICE, 7n])));
    expect(computeMessageBinding(ALICE, 7n)).to.equal(expected);
  });

  it('should differ per sender and per nonce', () => {
    const base = computeMessageBinding(ALICE, 0n);
    expect(computeMessageBinding(BOB, 0n)).to.not.equal(base);
    expect(computeMessageBinding(ALICE, 1n)).to.not.equal(base);
  });

  it('should ignore address case', () => {
    expect(computeMessageBinding(ALICE.toLowerCase(), 3n)).to.equal(computeMessageBinding(ALICE, 3n));
  });

  it('should use the group id as group scope', () => {
    expect(computeGroupScope(42n)).to.equal(42n);
  });

  it('should hash group id and epoch for epoch scope', () => {
    const expected = BigInt(keccak256(abi.encode(['uint256', 'uint256'], [42n, 3n])));
    expect(computeEpochScope(42n, 3n)).to.equal(expected);
    expect(computeEpochScope(42n, 4n)).to.not.equal(expected);
  });
});
