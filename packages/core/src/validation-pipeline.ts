/**
 * First phase of sponsorship: decide whether an operation will be paid for.
 *
 *   decode payload → group balance check → authorizer → context
 *
 * Business failures never throw. They end in a `rejected` outcome carrying a
 * {@link RejectionReason}, which is audited but is not meant to cross the
 * bundler boundary. Exceptions are left for broken collaborators.
 */

import { ProofAuthorizer } from './authorizers';
import { RejectionReason, RejectionReasonType, SponsorValidationError } from './errors';
import { GroupLedger } from './group-ledger';
import { decodeSponsorPayload, encodeValidationContext } from './payload';
import {
  auditEntry,
  AuditLogger,
  HexString,
  SponsorPayload,
  UserOperationView,
  ValidationContext,
} from './types';
import { normalizeAddress, UINT256_MAX } from './validation';

export type ValidationOutcome =
  | { status: 'approved'; context: HexString; decodedContext: ValidationContext }
  | { status: 'rejected'; reason: RejectionReasonType };

export class ValidationPipeline {
  private readonly ledger: GroupLedger;
  private readonly authorizer: ProofAuthorizer;
  private readonly auditLogger?: AuditLogger;

  constructor(ledger: GroupLedger, authorizer: ProofAuthorizer, auditLogger?: AuditLogger) {
    this.ledger = ledger;
    this.authorizer = authorizer;
    this.auditLogger = auditLogger;
  }

  get kind(): ProofAuthorizer['kind'] {
    return this.authorizer.kind;
  }

  /**
   * Validate an operation against the pre-fund it would cost at most.
   */
  async validate(operation: UserOperationView, requiredPreFund: bigint): Promise<ValidationOutcome> {
    let sender: string;
    let payload: SponsorPayload;
    try {
      sender = normalizeAddress(operation.sender, 'sender');
      payload = decodeSponsorPayload(operation.paymasterData);
    } catch (error) {
      if (error instanceof SponsorValidationError) {
        return this.rejected(RejectionReason.MALFORMED_PAYLOAD, undefined, error.message);
      }
      throw error;
    }

    if (
      typeof operation.nonce !== 'bigint' ||
      operation.nonce < 0n ||
      requiredPreFund < 0n ||
      requiredPreFund > UINT256_MAX
    ) {
      return this.rejected(RejectionReason.MALFORMED_PAYLOAD, payload.groupId);
    }

    if (!(await this.ledger.hasSufficientBalance(payload.groupId, requiredPreFund))) {
      return this.rejected(RejectionReason.INSUFFICIENT_BALANCE, payload.groupId);
    }

    const outcome = await this.authorizer.authorize({
      sender,
      nonce: operation.nonce,
      payload,
      requiredPreFund,
    });
    if (!outcome.ok) {
      return this.rejected(outcome.reason, payload.groupId);
    }

    this.auditLogger?.log(
      auditEntry('validate', this.actor(), true, payload.groupId.toString(), {
        mode: payload.mode,
        requiredPreFund,
      }),
    );
    return {
      status: 'approved',
      context: encodeValidationContext(outcome.context),
      decodedContext: outcome.context,
    };
  }

  private rejected(
    reason: RejectionReasonType,
    groupId?: bigint,
    detail?: string,
  ): ValidationOutcome {
    this.auditLogger?.log(
      auditEntry('validate', this.actor(), false, groupId?.toString(), { reason, detail }),
    );
    return { status: 'rejected', reason };
  }

  private actor(): string {
    return `validation-pipeline:${this.authorizer.kind}`;
  }
}
