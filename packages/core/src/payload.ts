/**
 * Wire codec for the authorization payload and the validation context.
 *
 * Payload layout (big-endian, fixed offsets):
 *
 *   byte  0        mode: 0x00 new proof, 0x01 cached reference
 *   bytes 1..33    uint256 group id
 *   new:           13 words: merkleTreeDepth, merkleTreeRoot, nullifier,
 *                  message, scope, points[0..7]
 *   cached:        nothing, or one uint256 nullifier
 *
 * Context layout: uint256 group id, optionally followed by uint256 nullifier,
 * uint256 reserved quota amount and uint256 admission epoch.
 */

import { concat, dataLength, dataSlice, getBytes, isHexString, toBeHex, toBigInt } from 'ethers';
import { SponsorValidationError, SponsorErrorCode } from './errors';
import {
  HexString,
  PayloadMode,
  SemaphoreProof,
  SponsorPayload,
  ValidationContext,
} from './types';
import { PROOF_POINT_COUNT, validateProofShape, validateUint256 } from './validation';

const WORD = 32;
const HEADER_LENGTH = 1 + WORD;
const PROOF_WORDS = 5 + PROOF_POINT_COUNT;
const QUOTA_CONTEXT_LENGTH = 4 * WORD;

/** Byte length of a payload carrying a full proof. */
export const NEW_PAYLOAD_LENGTH = HEADER_LENGTH + PROOF_WORDS * WORD;
/** Byte length of a cached payload without a reference. */
export const CACHED_PAYLOAD_LENGTH = HEADER_LENGTH;
/** Byte length of a cached payload carrying a nullifier. */
export const CACHED_NULLIFIER_PAYLOAD_LENGTH = HEADER_LENGTH + WORD;

function word(value: bigint): string {
  return toBeHex(value, WORD);
}

function readWord(data: HexString, index: number, base: number): bigint {
  const start = base + index * WORD;
  return toBigInt(dataSlice(data, start, start + WORD));
}

function requireHex(data: HexString, field: string): void {
  if (typeof data !== 'string' || !isHexString(data, true)) {
    throw new SponsorValidationError(`${field} must be a 0x-prefixed hex string`, field);
  }
}

// ---------------------------------------------------------------------------
// Payload
// ---------------------------------------------------------------------------

/**
 * Encode a payload into its wire form.
 */
export function encodeSponsorPayload(payload: SponsorPayload): HexString {
  validateUint256(payload.groupId, 'groupId');
  const parts: string[] = [];

  if (payload.mode === 'new') {
    validateProofShape(payload.proof);
    const { proof } = payload;
    parts.push(toBeHex(PayloadMode.NEW, 1), word(payload.groupId));
    parts.push(
      word(proof.merkleTreeDepth),
      word(proof.merkleTreeRoot),
      word(proof.nullifier),
      word(proof.message),
      word(proof.scope),
    );
    for (const point of proof.points) {
      parts.push(word(point));
    }
  } else {
    parts.push(toBeHex(PayloadMode.CACHED, 1), word(payload.groupId));
    if (payload.nullifier !== undefined) {
      validateUint256(payload.nullifier, 'nullifier');
      parts.push(word(payload.nullifier));
    }
  }

  return concat(parts);
}

/**
 * Decode a payload from its wire form.
 *
 * @throws SponsorValidationError if the mode byte is unknown or the length
 *   does not match the mode
 */
export function decodeSponsorPayload(data: HexString): SponsorPayload {
  requireHex(data, 'paymasterData');
  const length = dataLength(data);
  if (length < HEADER_LENGTH) {
    throw new SponsorValidationError(
      `paymasterData must be at least ${HEADER_LENGTH} bytes (got ${length})`,
      'paymasterData',
    );
  }

  const mode = getBytes(data)[0];
  const groupId = toBigInt(dataSlice(data, 1, HEADER_LENGTH));

  if (mode === PayloadMode.NEW) {
    if (length !== NEW_PAYLOAD_LENGTH) {
      throw new SponsorValidationError(
        `new-proof payload must be ${NEW_PAYLOAD_LENGTH} bytes (got ${length})`,
        'paymasterData',
      );
    }
    const proof: SemaphoreProof = {
      merkleTreeDepth: readWord(data, 0, HEADER_LENGTH),
      merkleTreeRoot: readWord(data, 1, HEADER_LENGTH),
      nullifier: readWord(data, 2, HEADER_LENGTH),
      message: readWord(data, 3, HEADER_LENGTH),
      scope: readWord(data, 4, HEADER_LENGTH),
      points: Array.from({ length: PROOF_POINT_COUNT }, (_, i) =>
        readWord(data, 5 + i, HEADER_LENGTH),
      ),
    };
    validateProofShape(proof);
    return { mode: 'new', groupId, proof };
  }

  if (mode === PayloadMode.CACHED) {
    if (length === CACHED_PAYLOAD_LENGTH) {
      return { mode: 'cached', groupId };
    }
    if (length === CACHED_NULLIFIER_PAYLOAD_LENGTH) {
      return { mode: 'cached', groupId, nullifier: readWord(data, 0, HEADER_LENGTH) };
    }
    throw new SponsorValidationError(
      `cached payload must be ${CACHED_PAYLOAD_LENGTH} or ${CACHED_NULLIFIER_PAYLOAD_LENGTH} bytes (got ${length})`,
      'paymasterData',
    );
  }

  throw new SponsorValidationError(`Unknown payload mode 0x${mode.toString(16)}`, 'paymasterData');
}

// ---------------------------------------------------------------------------
// Context
// ---------------------------------------------------------------------------

export function encodeValidationContext(context: ValidationContext): HexString {
  validateUint256(context.groupId, 'context.groupId');
  if (context.quota === undefined) {
    return word(context.groupId);
  }
  validateUint256(context.quota.nullifier, 'context.quota.nullifier');
  validateUint256(context.quota.reserved, 'context.quota.reserved');
  validateUint256(context.quota.epoch, 'context.quota.epoch');
  return concat([
    word(context.groupId),
    word(context.quota.nullifier),
    word(context.quota.reserved),
    word(context.quota.epoch),
  ]);
}

/**
 * @throws SponsorValidationError (code MALFORMED_CONTEXT) if the context was
 *   not produced by {@link encodeValidationContext}
 */
export function decodeValidationContext(data: HexString): ValidationContext {
  if (typeof data !== 'string' || !isHexString(data, true)) {
    throw new SponsorValidationError(
      'context must be a 0x-prefixed hex string',
      'context',
      SponsorErrorCode.MALFORMED_CONTEXT,
    );
  }
  const length = dataLength(data);
  if (length === WORD) {
    return { groupId: toBigInt(data) };
  }
  if (length === QUOTA_CONTEXT_LENGTH) {
    return {
      groupId: readWord(data, 0, 0),
      quota: {
        nullifier: readWord(data, 1, 0),
        reserved: readWord(data, 2, 0),
        epoch: readWord(data, 3, 0),
      },
    };
  }
  throw new SponsorValidationError(
    `context must be ${WORD} or ${QUOTA_CONTEXT_LENGTH} bytes (got ${length})`,
    'context',
    SponsorErrorCode.MALFORMED_CONTEXT,
  );
}
