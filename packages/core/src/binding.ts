/**
 * Binding values a membership proof must commit to.
 *
 * A proof's `message` ties it to one sponsored operation (sender + nonce) so it
 * cannot be lifted onto another account's operation. Its `scope` ties it to a
 * group, and in the quota-aware variant to a group and epoch, so a nullifier
 * from one context is never accepted in another.
 */

import { AbiCoder, keccak256 } from 'ethers';
import { Address } from './types';

const abi = AbiCoder.defaultAbiCoder();

/**
 * Message a proof must carry to sponsor an operation:
 * `uint256(keccak256(abi.encode(address sender, uint256 nonce)))`.
 */
export function computeMessageBinding(sender: Address, nonce: bigint): bigint {
  const encoded = abi.encode(['address', 'uint256'], [sender, nonce]);
  return BigInt(keccak256(encoded));
}

/**
 * Scope of a proof valid for a whole group. Proofs are generated with the
 * group id itself as scope.
 */
export function computeGroupScope(groupId: bigint): bigint {
  return groupId;
}

/**
 * Scope of a proof valid for one group during one epoch:
 * `uint256(keccak256(abi.encode(uint256 groupId, uint256 epoch)))`.
 */
export function computeEpochScope(groupId: bigint, epoch: bigint): bigint {
  const encoded = abi.encode(['uint256', 'uint256'], [groupId, epoch]);
  return BigInt(keccak256(encoded));
}
