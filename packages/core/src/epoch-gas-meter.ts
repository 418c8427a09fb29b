/**
 * Epoch-scoped gas quota meter.
 *
 * Bounds the sponsored gas a single proof holder may consume per epoch. Holders
 * are identified by their proof nullifier, never by address, so quota tracking
 * does not link operations to an identity.
 *
 * The epoch counter is process-wide state advanced by an explicit call: the
 * validation phase cannot read wall-clock time, so it treats the counter as a
 * frozen value.
 *
 * Reset is lazy. A record whose stored epoch differs from the current epoch
 * counts as unused; the stale figures are zeroed the next time an admission
 * writes the record, never proactively. Settlement charges the epoch the
 * operation was admitted in, so a late settlement never touches the usage or
 * reservations of a later epoch.
 *
 * Admission reserves the operation's pre-fund against the quota until the
 * operation settles, so two operations validated back to back in one batch
 * cannot both claim the last unit of a quota, whichever order they arrive in.
 */

import {
  RejectionReason,
  RejectionReasonType,
  SponsorAccessError,
  SponsorConfigError,
  SponsorErrorCode,
  SponsorValidationError,
} from './errors';
import {
  Address,
  auditEntry,
  AuditLogger,
  EpochState,
  EpochStore,
  GasQuotaRecord,
  GasQuotaStore,
  ProofVerifierClient,
} from './types';
import { normalizeAddress, validateAmount, validatePositiveAmount, validateUint256 } from './validation';

export interface EpochGasMeterOptions {
  /** Epoch length in seconds */
  epochDuration: number;
  /** Start of epoch 0 in seconds */
  firstEpochTimestamp: number;
  auditLogger?: AuditLogger;
}

export type QuotaVerdict =
  | { ok: true; gasUsed: bigint; quota: bigint }
  | { ok: false; reason: RejectionReasonType };

export class EpochGasMeter {
  private readonly verifier: ProofVerifierClient;
  private readonly quotaStore: GasQuotaStore;
  private readonly epochStore: EpochStore;
  private readonly initialState: EpochState;
  private readonly auditLogger?: AuditLogger;

  constructor(
    verifier: ProofVerifierClient,
    quotaStore: GasQuotaStore,
    epochStore: EpochStore,
    options: EpochGasMeterOptions,
  ) {
    this.verifier = verifier;
    this.quotaStore = quotaStore;
    this.epochStore = epochStore;
    this.auditLogger = options.auditLogger;

    if (!Number.isInteger(options.epochDuration) || options.epochDuration <= 0) {
      throw new SponsorConfigError('epochDuration must be a positive integer (seconds)');
    }
    if (!Number.isInteger(options.firstEpochTimestamp) || options.firstEpochTimestamp < 0) {
      throw new SponsorConfigError('firstEpochTimestamp must be a non-negative integer (seconds)');
    }

    this.initialState = {
      firstEpochTimestamp: BigInt(options.firstEpochTimestamp),
      epochDuration: BigInt(options.epochDuration),
      currentEpoch: 0n,
    };
  }

  // -------------------------------------------------------------------------
  // Administrative surface
  // -------------------------------------------------------------------------

  /**
   * Set the per-nullifier gas allowance of a group.
   *
   * @throws SponsorAccessError (code NOT_GROUP_ADMIN) unless `caller` administers the group
   */
  async setQuota(caller: Address, groupId: bigint, maxGasPerEpoch: bigint): Promise<void> {
    validateUint256(groupId, 'groupId');
    validatePositiveAmount(maxGasPerEpoch, 'maxGasPerEpoch');
    const normalizedCaller = normalizeAddress(caller, 'caller');

    const admin = await this.verifier.getGroupAdmin(groupId);
    if (admin === null || normalizeAddress(admin, 'admin') !== normalizedCaller) {
      this.auditLogger?.log(
        auditEntry('set_quota', 'epoch-gas-meter', false, groupId.toString(), {
          caller: normalizedCaller,
        }),
      );
      throw new SponsorAccessError(
        `Caller is not the admin of group '${groupId}'`,
        normalizedCaller,
        SponsorErrorCode.NOT_GROUP_ADMIN,
      );
    }

    await this.quotaStore.setQuota(groupId, maxGasPerEpoch);
    this.auditLogger?.log(
      auditEntry('set_quota', 'epoch-gas-meter', true, groupId.toString(), {
        caller: normalizedCaller,
        maxGasPerEpoch,
      }),
    );
  }

  /**
   * Recompute the current epoch from externally supplied time. The counter
   * never moves backwards; calling again within the same window is a no-op.
   *
   * @param now - Current time in seconds
   * @returns The current epoch after the update
   */
  async advanceEpoch(now: number): Promise<bigint> {
    if (!Number.isInteger(now) || now < 0) {
      throw new SponsorConfigError('now must be a non-negative integer (seconds)');
    }

    const state = await this.state();
    const elapsed = BigInt(now) - state.firstEpochTimestamp;
    const computed = elapsed > 0n ? elapsed / state.epochDuration : 0n;

    if (computed <= state.currentEpoch) {
      return state.currentEpoch;
    }

    await this.epochStore.setState({ ...state, currentEpoch: computed });
    this.auditLogger?.log(
      auditEntry('advance_epoch', 'epoch-gas-meter', true, undefined, {
        from: state.currentEpoch,
        to: computed,
      }),
    );
    return computed;
  }

  // -------------------------------------------------------------------------
  // Validation phase
  // -------------------------------------------------------------------------

  /**
   * Check whether a nullifier may take on `requiredAmount` more gas in the
   * current epoch. Groups without a configured quota admit nothing.
   */
  async admit(nullifier: bigint, groupId: bigint, requiredAmount: bigint): Promise<QuotaVerdict> {
    const quota = await this.quotaStore.getQuota(groupId);
    if (quota === null) {
      return { ok: false, reason: RejectionReason.QUOTA_EXCEEDED };
    }

    const currentEpoch = await this.currentEpoch();
    const record = await this.quotaStore.getRecord(nullifier);
    const committed = record && record.epoch === currentEpoch ? record.gasUsed + record.reserved : 0n;

    if (committed + requiredAmount > quota) {
      return { ok: false, reason: RejectionReason.QUOTA_EXCEEDED };
    }
    return { ok: true, gasUsed: committed, quota };
  }

  /**
   * Record an admitted operation: stamp the record with the current epoch and
   * root, and reserve the operation's pre-fund.
   */
  async commitAdmission(
    nullifier: bigint,
    groupId: bigint,
    merkleRoot: bigint,
    reservedAmount: bigint,
  ): Promise<GasQuotaRecord> {
    const current = await this.freshRecord(nullifier, groupId);
    const record: GasQuotaRecord = {
      ...current,
      groupId,
      lastMerkleRoot: merkleRoot,
      reserved: current.reserved + reservedAmount,
    };
    await this.quotaStore.setRecord(nullifier, record);
    return record;
  }

  // -------------------------------------------------------------------------
  // Settlement phase
  // -------------------------------------------------------------------------

  /**
   * Charge a settled cost to a nullifier and release its reservation. Never
   * re-checks the quota: the operation has already executed.
   *
   * The charge lands in `admissionEpoch` (default: the current epoch). When a
   * later admission has already moved the record to a newer epoch, the cost
   * belongs to a closed epoch and the record is returned unchanged.
   *
   * @throws SponsorValidationError (code MALFORMED_CONTEXT) if the admission
   *   epoch lies in the future
   */
  async record(
    nullifier: bigint,
    actualAmount: bigint,
    groupId: bigint,
    releasedReservation = 0n,
    admissionEpoch?: bigint,
  ): Promise<GasQuotaRecord> {
    validateAmount(actualAmount, 'actualAmount');
    const currentEpoch = await this.currentEpoch();
    const epoch = admissionEpoch ?? currentEpoch;
    if (epoch > currentEpoch) {
      throw new SponsorValidationError(
        `Admission epoch ${epoch} is ahead of the current epoch ${currentEpoch}`,
        'context',
        SponsorErrorCode.MALFORMED_CONTEXT,
      );
    }

    const stored = await this.quotaStore.getRecord(nullifier);
    if (stored && stored.epoch > epoch) {
      return stored;
    }

    const current: GasQuotaRecord =
      stored && stored.epoch === epoch
        ? stored
        : { groupId, gasUsed: 0n, reserved: 0n, lastMerkleRoot: stored?.lastMerkleRoot ?? 0n, epoch };
    const record: GasQuotaRecord = {
      ...current,
      gasUsed: current.gasUsed + actualAmount,
      reserved: current.reserved > releasedReservation ? current.reserved - releasedReservation : 0n,
    };
    await this.quotaStore.setRecord(nullifier, record);
    return record;
  }

  // -------------------------------------------------------------------------
  // Read surface
  // -------------------------------------------------------------------------

  async currentEpoch(): Promise<bigint> {
    return (await this.state()).currentEpoch;
  }

  async gasData(nullifier: bigint): Promise<GasQuotaRecord | null> {
    return this.quotaStore.getRecord(nullifier);
  }

  /** Gas charged to a nullifier in the current epoch (0 if the record is stale). */
  async effectiveGasUsed(nullifier: bigint): Promise<bigint> {
    const record = await this.quotaStore.getRecord(nullifier);
    if (!record || record.epoch !== (await this.currentEpoch())) {
      return 0n;
    }
    return record.gasUsed;
  }

  async quotaOf(groupId: bigint): Promise<bigint | null> {
    return this.quotaStore.getQuota(groupId);
  }

  // -------------------------------------------------------------------------

  private async state(): Promise<EpochState> {
    return (await this.epochStore.getState()) ?? this.initialState;
  }

  /**
   * The stored record with stale-epoch figures zeroed, or a new record.
   */
  private async freshRecord(nullifier: bigint, groupId: bigint): Promise<GasQuotaRecord> {
    const currentEpoch = await this.currentEpoch();
    const stored = await this.quotaStore.getRecord(nullifier);
    if (!stored) {
      return { groupId, gasUsed: 0n, reserved: 0n, lastMerkleRoot: 0n, epoch: currentEpoch };
    }
    if (stored.epoch !== currentEpoch) {
      return { ...stored, gasUsed: 0n, reserved: 0n, epoch: currentEpoch };
    }
    return stored;
  }
}

// ---------------------------------------------------------------------------
// In-memory implementations
// ---------------------------------------------------------------------------

export class InMemoryGasQuotaStore implements GasQuotaStore {
  private records = new Map<bigint, GasQuotaRecord>();
  private quotas = new Map<bigint, bigint>();

  constructor() {
    if (typeof process !== 'undefined' && process.env.NODE_ENV === 'production') {
      console.warn(
        '[gas-sponsor] InMemoryGasQuotaStore is not suitable for production. ' +
          'Gas usage will be lost on restart, resetting every quota. Use a persistent store (Redis).',
      );
    }
  }

  async getRecord(nullifier: bigint): Promise<GasQuotaRecord | null> {
    const record = this.records.get(nullifier);
    return record ? { ...record } : null;
  }

  async setRecord(nullifier: bigint, record: GasQuotaRecord): Promise<void> {
    this.records.set(nullifier, { ...record });
  }

  async getQuota(groupId: bigint): Promise<bigint | null> {
    return this.quotas.get(groupId) ?? null;
  }

  async setQuota(groupId: bigint, maxGasPerEpoch: bigint): Promise<void> {
    this.quotas.set(groupId, maxGasPerEpoch);
  }
}

export class InMemoryEpochStore implements EpochStore {
  private state: EpochState | null = null;

  async getState(): Promise<EpochState | null> {
    return this.state ? { ...this.state } : null;
  }

  async setState(state: EpochState): Promise<void> {
    this.state = { ...state };
  }
}
