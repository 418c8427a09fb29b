/**
 * Input validation utilities.
 *
 * Boundary checks for values that enter the system from external callers
 * (bundler payloads, administrative requests, configuration). Values produced
 * and consumed inside the package are not re-validated at every hop.
 */

import { getAddress, isAddress } from 'ethers';
import { SponsorValidationError, SponsorErrorCode } from './errors';
import { Address, SemaphoreProof } from './types';

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** Largest uint256 value. */
export const UINT256_MAX = (1n << 256n) - 1n;

/** Number of Groth16 points carried by a membership proof. */
export const PROOF_POINT_COUNT = 8;

/** Accepted membership tree depths. */
export const MIN_TREE_DEPTH = 1;
export const MAX_TREE_DEPTH = 32;

// ---------------------------------------------------------------------------
// Validation functions
// ---------------------------------------------------------------------------

/**
 * Validate that a value is a uint256.
 * @throws SponsorValidationError if not a bigint in [0, 2^256)
 */
export function validateUint256(value: bigint, field: string): void {
  if (typeof value !== 'bigint') {
    throw new SponsorValidationError(`${field} must be a bigint`, field);
  }
  if (value < 0n || value > UINT256_MAX) {
    throw new SponsorValidationError(`${field} must fit in 256 bits`, field);
  }
}

/**
 * Validate a deposit or quota amount: a strictly positive uint256.
 * @throws SponsorValidationError with code ZERO_AMOUNT for zero or negative amounts
 */
export function validatePositiveAmount(amount: bigint, field: string): void {
  if (typeof amount !== 'bigint') {
    throw new SponsorValidationError(`${field} must be a bigint`, field);
  }
  if (amount <= 0n) {
    throw new SponsorValidationError(
      `${field} must be non-zero`,
      field,
      SponsorErrorCode.ZERO_AMOUNT,
    );
  }
  validateUint256(amount, field);
}

/**
 * Validate a non-negative uint256 amount (pre-fund estimates, actual costs).
 */
export function validateAmount(amount: bigint, field: string): void {
  validateUint256(amount, field);
}

/**
 * Normalize an account address to its checksummed form.
 * @throws SponsorValidationError if the address is not a 20-byte hex address
 */
export function normalizeAddress(address: string, field = 'address'): Address {
  if (typeof address !== 'string' || !isAddress(address)) {
    throw new SponsorValidationError(`${field} must be a 20-byte hex address`, field);
  }
  return getAddress(address);
}

/**
 * Parse a decimal or 0x-hex string into a uint256.
 * @throws SponsorValidationError on malformed input
 */
export function parseUint256(value: string, field: string): bigint {
  if (typeof value !== 'string' || value.length === 0) {
    throw new SponsorValidationError(`${field} must be a non-empty string`, field);
  }
  if (!/^(0x[0-9a-fA-F]+|[0-9]+)$/.test(value)) {
    throw new SponsorValidationError(`${field} must be a decimal or 0x-hex integer`, field);
  }
  const parsed = BigInt(value);
  validateUint256(parsed, field);
  return parsed;
}

/**
 * Validate the shape of a membership proof record.
 * @throws SponsorValidationError if any field is out of range
 */
export function validateProofShape(proof: SemaphoreProof): void {
  validateUint256(proof.merkleTreeDepth, 'proof.merkleTreeDepth');
  if (
    proof.merkleTreeDepth < BigInt(MIN_TREE_DEPTH) ||
    proof.merkleTreeDepth > BigInt(MAX_TREE_DEPTH)
  ) {
    throw new SponsorValidationError(
      `proof.merkleTreeDepth must be between ${MIN_TREE_DEPTH} and ${MAX_TREE_DEPTH}`,
      'proof.merkleTreeDepth',
    );
  }
  validateUint256(proof.merkleTreeRoot, 'proof.merkleTreeRoot');
  validateUint256(proof.nullifier, 'proof.nullifier');
  validateUint256(proof.message, 'proof.message');
  validateUint256(proof.scope, 'proof.scope');
  if (!Array.isArray(proof.points) || proof.points.length !== PROOF_POINT_COUNT) {
    throw new SponsorValidationError(
      `proof.points must contain exactly ${PROOF_POINT_COUNT} values`,
      'proof.points',
    );
  }
  proof.points.forEach((point, i) => validateUint256(point, `proof.points[${i}]`));
}
