/**
 * Custom error hierarchy for gas-sponsor
 *
 * Errors are reserved for hard failures: administrative misuse, bad
 * configuration, malformed input on the administrative surface. Validation of
 * sponsored operations never throws; it reports a {@link RejectionReason}.
 */

/**
 * Error codes for programmatic error checking
 */
export const SponsorErrorCode = {
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  CONFIG_ERROR: 'CONFIG_ERROR',
  ACCESS_DENIED: 'ACCESS_DENIED',
  PROOF_ERROR: 'PROOF_ERROR',
  ZERO_AMOUNT: 'ZERO_AMOUNT',
  NOT_GROUP_ADMIN: 'NOT_GROUP_ADMIN',
  TARGET_ONLY: 'TARGET_ONLY',
  UNKNOWN_GROUP: 'UNKNOWN_GROUP',
  MALFORMED_CONTEXT: 'MALFORMED_CONTEXT',
  CORRUPT_PROOF_RECORD: 'CORRUPT_PROOF_RECORD',
} as const;

export type SponsorErrorCodeType = (typeof SponsorErrorCode)[keyof typeof SponsorErrorCode];

/**
 * Base error class for all gas-sponsor errors
 */
export class SponsorError extends Error {
  readonly code: string;

  constructor(code: string, message: string) {
    super(message);
    this.name = 'SponsorError';
    this.code = code;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Validation error for invalid input or constraints
 */
export class SponsorValidationError extends SponsorError {
  readonly field?: string;

  constructor(message: string, field?: string, code: SponsorErrorCodeType = SponsorErrorCode.VALIDATION_ERROR) {
    super(code, message);
    this.name = 'SponsorValidationError';
    this.field = field;
  }
}

/**
 * Configuration error for invalid setup or options
 */
export class SponsorConfigError extends SponsorError {
  constructor(message: string) {
    super(SponsorErrorCode.CONFIG_ERROR, message);
    this.name = 'SponsorConfigError';
  }
}

/**
 * Raised when a caller invokes an operation it is not entitled to
 * (e.g. a non-admin setting a group quota).
 */
export class SponsorAccessError extends SponsorError {
  readonly caller: string;

  constructor(message: string, caller: string, code: SponsorErrorCodeType = SponsorErrorCode.ACCESS_DENIED) {
    super(code, message);
    this.name = 'SponsorAccessError';
    this.caller = caller;
  }
}

/**
 * Proof error for stored proof records that do not match what they are filed under
 */
export class SponsorProofError extends SponsorError {
  constructor(message: string, code: SponsorErrorCodeType = SponsorErrorCode.PROOF_ERROR) {
    super(code, message);
    this.name = 'SponsorProofError';
  }
}

/**
 * Reasons a sponsored operation can be rejected during validation.
 *
 * These never cross the bundler boundary: the bundler only sees a generic
 * failure status. They are kept for audit entries and internal callers.
 */
export const RejectionReason = {
  MALFORMED_PAYLOAD: 'MALFORMED_PAYLOAD',
  UNSUPPORTED_MODE: 'UNSUPPORTED_MODE',
  INSUFFICIENT_BALANCE: 'INSUFFICIENT_BALANCE',
  INVALID_MESSAGE_BINDING: 'INVALID_MESSAGE_BINDING',
  INVALID_SCOPE_BINDING: 'INVALID_SCOPE_BINDING',
  NO_CACHED_PROOF: 'NO_CACHED_PROOF',
  STALE_CACHED_PROOF: 'STALE_CACHED_PROOF',
  PROOF_REJECTED: 'PROOF_REJECTED',
  POLICY_REJECTED: 'POLICY_REJECTED',
  QUOTA_EXCEEDED: 'QUOTA_EXCEEDED',
} as const;

export type RejectionReasonType = (typeof RejectionReason)[keyof typeof RejectionReason];
