/**
 * Poseidon hash utilities using circomlibjs
 *
 * Used for the membership tree nodes so tree roots match what a Semaphore
 * prover commits to.
 */

import { buildPoseidon } from 'circomlibjs';

/** Poseidon hash function instance from circomlibjs. */
interface PoseidonHasher {
  (inputs: (number | bigint)[]): Uint8Array;
  F: { toObject(hash: Uint8Array): bigint };
}

let poseidonInstance: Promise<PoseidonHasher> | null = null;

/**
 * Initialize the Poseidon hash function (lazy loaded, built once)
 */
function getPoseidon(): Promise<PoseidonHasher> {
  if (!poseidonInstance) {
    poseidonInstance = buildPoseidon();
  }
  return poseidonInstance;
}

/**
 * Compute Poseidon hash of inputs
 *
 * @param inputs - Array of numbers or bigints to hash
 * @returns The hash as a bigint
 */
export async function poseidonHash(inputs: (number | bigint)[]): Promise<bigint> {
  const poseidon = await getPoseidon();
  const hash = poseidon(inputs);
  return poseidon.F.toObject(hash);
}

/**
 * Hash two child nodes into their parent.
 */
export async function hashMerkleNode(left: bigint, right: bigint): Promise<bigint> {
  return poseidonHash([left, right]);
}
