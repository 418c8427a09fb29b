/**
 * Second phase of sponsorship: charge the real cost of an executed operation.
 *
 * Runs after the sponsored call, whatever its outcome, and cannot be rolled
 * back from here. The group's balance is debited even when the real cost
 * exceeds what is left; an underflow is reported as a
 * `settlement_underflow` audit entry and left for operators to resolve.
 *
 * The nullifier's quota record is charged before the group is debited: a
 * failing quota store leaves the group balance untouched.
 */

import { EpochGasMeter } from './epoch-gas-meter';
import { SponsorConfigError } from './errors';
import { GroupLedger } from './group-ledger';
import { decodeValidationContext } from './payload';
import { auditEntry, AuditLogger, HexString } from './types';

/** How the sponsored operation ended, as reported by the bundler. */
export type PostOpMode = 'opSucceeded' | 'opReverted' | 'postOpReverted';

export const POST_OP_MODES: readonly PostOpMode[] = ['opSucceeded', 'opReverted', 'postOpReverted'];

export interface SettlementReceipt {
  groupId: bigint;
  charged: bigint;
  /** Group balance after the debit (negative on underflow) */
  balance: bigint;
  underflow: boolean;
  nullifier?: bigint;
  /** Gas used on the nullifier's record after the charge */
  gasUsed?: bigint;
}

export class SettlementHandler {
  private readonly ledger: GroupLedger;
  private readonly meter?: EpochGasMeter;
  private readonly auditLogger?: AuditLogger;

  constructor(ledger: GroupLedger, meter?: EpochGasMeter, auditLogger?: AuditLogger) {
    this.ledger = ledger;
    this.meter = meter;
    this.auditLogger = auditLogger;
  }

  /**
   * Debit the group (and nullifier quota, if any) named by the context.
   *
   * @param context - Context returned by a successful validation
   * @throws SponsorValidationError if the context was not produced by validation
   */
  async settle(
    context: HexString,
    actualCost: bigint,
    mode: PostOpMode = 'opSucceeded',
  ): Promise<SettlementReceipt> {
    const decoded = decodeValidationContext(context);
    if (decoded.quota && !this.meter) {
      throw new SponsorConfigError('Context carries a quota reservation but no gas meter is configured');
    }

    const record =
      decoded.quota && this.meter
        ? await this.meter.record(
            decoded.quota.nullifier,
            actualCost,
            decoded.groupId,
            decoded.quota.reserved,
            decoded.quota.epoch,
          )
        : null;

    const balance = await this.ledger.debit(decoded.groupId, actualCost);
    const receipt: SettlementReceipt = {
      groupId: decoded.groupId,
      charged: actualCost,
      balance,
      underflow: balance < 0n,
    };
    if (decoded.quota && record) {
      receipt.nullifier = decoded.quota.nullifier;
      receipt.gasUsed = record.gasUsed;
    }

    this.auditLogger?.log(
      auditEntry('settle', 'settlement', true, decoded.groupId.toString(), {
        mode,
        actualCost,
        balance,
        nullifier: receipt.nullifier,
      }),
    );
    if (receipt.underflow) {
      this.auditLogger?.log(
        auditEntry('settlement_underflow', 'settlement', false, decoded.groupId.toString(), {
          actualCost,
          balance,
        }),
      );
    }
    return receipt;
  }
}
