/**
 * Sponsoring paymaster facade.
 *
 * Wires a {@link ValidationPipeline} and a {@link SettlementHandler} around
 * one authorizer variant and exposes the two-phase surface a bundler drives
 * (validate, then post-op), plus the administrative and read operations.
 *
 * Calls that write state run one at a time under a per-paymaster mutex,
 * whatever the host's request concurrency. Reads do not take the lock. Stores
 * shared by several paymaster instances are not covered by it.
 *
 * @example
 * ```typescript
 * const paymaster = createPaymaster({ variant: 'cached', verifier });
 * await paymaster.depositForGroup(groupId, parseEther('1'));
 *
 * const { context, validationData } = await paymaster.validatePaymasterUserOp(userOp, maxCost);
 * if (validationData === SIG_VALIDATION_SUCCESS) {
 *   // ... execute ...
 *   await paymaster.postOp('opSucceeded', context, actualGasCost);
 * }
 * ```
 */

import { Mutex } from 'async-mutex';
import {
  AuthorizerKind,
  CachedProofAuthorizer,
  DirectVerifyAuthorizer,
  NullifierQuotaAuthorizer,
  PolicyDelegateAuthorizer,
  ProofAuthorizer,
} from './authorizers';
import { EpochGasMeter, InMemoryEpochStore, InMemoryGasQuotaStore } from './epoch-gas-meter';
import { SponsorConfigError } from './errors';
import { GroupLedger, InMemoryEscrow, InMemoryGroupDepositStore } from './group-ledger';
import { SponsorshipPolicy } from './policy';
import { InMemoryCachedProofStore, ProofCache, StalenessPolicy } from './proof-cache';
import { PostOpMode, SettlementHandler, SettlementReceipt } from './settlement';
import {
  Address,
  AuditLogger,
  CachedProof,
  CachedProofStore,
  Clock,
  DepositEscrow,
  EpochStore,
  GasQuotaRecord,
  GasQuotaStore,
  GroupDepositStore,
  HexString,
  ProofVerifierClient,
  systemClock,
  UserOperationView,
} from './types';
import { ValidationOutcome, ValidationPipeline } from './validation-pipeline';
import { normalizeAddress } from './validation';

/** validationData returned for an approved operation. */
export const SIG_VALIDATION_SUCCESS = 0;
/** validationData returned for a rejected operation. */
export const SIG_VALIDATION_FAILED = 1;

export type PaymasterVariant = AuthorizerKind;

export const PAYMASTER_VARIANTS: readonly PaymasterVariant[] = ['direct', 'cached', 'gas-limited', 'policy'];

/** Default epoch length: one day. */
export const DEFAULT_EPOCH_DURATION = 24 * 60 * 60;

export interface PaymasterValidationResult {
  /** Context to hand back at post-op; `0x` when rejected */
  context: HexString;
  validationData: typeof SIG_VALIDATION_SUCCESS | typeof SIG_VALIDATION_FAILED;
}

export interface PaymasterStores {
  deposits?: GroupDepositStore;
  proofs?: CachedProofStore;
  quotas?: GasQuotaStore;
  epochs?: EpochStore;
}

export interface CreatePaymasterOptions {
  variant: PaymasterVariant;
  verifier: ProofVerifierClient;
  escrow?: DepositEscrow;
  stores?: PaymasterStores;
  /** Time source for epoch advancement (seconds) */
  clock?: Clock;
  /** Cached variant only */
  stalenessPolicy?: StalenessPolicy;
  /** Gas-limited variant only; seconds */
  epochDuration?: number;
  /** Gas-limited variant only; seconds, defaults to the clock at creation */
  firstEpochTimestamp?: number;
  /** Policy variant only */
  policy?: SponsorshipPolicy;
  /** Address the paymaster acts as when enforcing a policy */
  address?: Address;
  auditLogger?: AuditLogger;
}

interface PaymasterParts {
  ledger: GroupLedger;
  escrow: DepositEscrow;
  pipeline: ValidationPipeline;
  settlement: SettlementHandler;
  clock: Clock;
  meter?: EpochGasMeter;
  proofCache?: ProofCache;
}

export class SponsorPaymaster {
  private readonly ledger: GroupLedger;
  private readonly escrow: DepositEscrow;
  private readonly pipeline: ValidationPipeline;
  private readonly settlement: SettlementHandler;
  private readonly clock: Clock;
  private readonly meter?: EpochGasMeter;
  private readonly proofCache?: ProofCache;
  private readonly writes = new Mutex();

  constructor(parts: PaymasterParts) {
    this.ledger = parts.ledger;
    this.escrow = parts.escrow;
    this.pipeline = parts.pipeline;
    this.settlement = parts.settlement;
    this.clock = parts.clock;
    this.meter = parts.meter;
    this.proofCache = parts.proofCache;
  }

  get variant(): PaymasterVariant {
    return this.pipeline.kind;
  }

  // -------------------------------------------------------------------------
  // Two-phase surface
  // -------------------------------------------------------------------------

  /**
   * Bundler-facing validation. The rejection reason is not exposed here;
   * use {@link validate} to see it.
   */
  async validatePaymasterUserOp(
    userOp: UserOperationView,
    maxCost: bigint,
  ): Promise<PaymasterValidationResult> {
    const outcome = await this.validate(userOp, maxCost);
    if (outcome.status === 'rejected') {
      return { context: '0x', validationData: SIG_VALIDATION_FAILED };
    }
    return { context: outcome.context, validationData: SIG_VALIDATION_SUCCESS };
  }

  async validate(userOp: UserOperationView, maxCost: bigint): Promise<ValidationOutcome> {
    return this.writes.runExclusive(() => this.pipeline.validate(userOp, maxCost));
  }

  /**
   * Settle an operation approved by {@link validatePaymasterUserOp}. Runs for
   * every post-op mode; the group pays for reverted operations too.
   */
  async postOp(mode: PostOpMode, context: HexString, actualGasCost: bigint): Promise<SettlementReceipt> {
    return this.writes.runExclusive(() => this.settlement.settle(context, actualGasCost, mode));
  }

  // -------------------------------------------------------------------------
  // Administration
  // -------------------------------------------------------------------------

  /** Anyone may fund any group. */
  async depositForGroup(groupId: bigint, amount: bigint): Promise<bigint> {
    return this.writes.runExclusive(() => this.ledger.deposit(groupId, amount));
  }

  async setMaxGasPerUserPerEpoch(caller: Address, groupId: bigint, maxGas: bigint): Promise<void> {
    const meter = this.requireMeter();
    await this.writes.runExclusive(() => meter.setQuota(caller, groupId, maxGas));
  }

  /** Move the epoch counter to the one the clock falls in. */
  async advanceEpoch(): Promise<bigint> {
    const meter = this.requireMeter();
    return this.writes.runExclusive(() => meter.advanceEpoch(this.clock()));
  }

  // -------------------------------------------------------------------------
  // Reads
  // -------------------------------------------------------------------------

  async groupDeposits(groupId: bigint): Promise<bigint> {
    return this.ledger.balanceOf(groupId);
  }

  async getDeposit(): Promise<bigint> {
    return this.escrow.getDeposit();
  }

  async gasData(nullifier: bigint): Promise<GasQuotaRecord | null> {
    return this.requireMeter().gasData(nullifier);
  }

  async currentEpoch(): Promise<bigint> {
    return this.requireMeter().currentEpoch();
  }

  async getCachedProof(member: Address, groupId: bigint): Promise<CachedProof | null> {
    if (!this.proofCache) {
      throw new SponsorConfigError(`The '${this.variant}' paymaster keeps no proof cache`);
    }
    return this.proofCache.getCachedProof(normalizeAddress(member, 'member'), groupId);
  }

  private requireMeter(): EpochGasMeter {
    if (!this.meter) {
      throw new SponsorConfigError(`The '${this.variant}' paymaster has no gas quota`);
    }
    return this.meter;
  }
}

/**
 * Build a paymaster of the given variant. Stores not supplied default to
 * in-memory implementations.
 *
 * @throws SponsorConfigError on an unknown variant or missing variant options
 */
export function createPaymaster(options: CreatePaymasterOptions): SponsorPaymaster {
  if (!PAYMASTER_VARIANTS.includes(options.variant)) {
    throw new SponsorConfigError(`variant must be one of ${PAYMASTER_VARIANTS.join(', ')}`);
  }

  const stores = options.stores ?? {};
  const clock = options.clock ?? systemClock;
  const escrow = options.escrow ?? new InMemoryEscrow();
  const ledger = new GroupLedger(stores.deposits ?? new InMemoryGroupDepositStore(), escrow, options.auditLogger);

  let authorizer: ProofAuthorizer;
  let meter: EpochGasMeter | undefined;
  let proofCache: ProofCache | undefined;

  switch (options.variant) {
    case 'direct':
      authorizer = new DirectVerifyAuthorizer(options.verifier);
      break;
    case 'cached':
      proofCache = new ProofCache(options.verifier, stores.proofs ?? new InMemoryCachedProofStore(), {
        stalenessPolicy: options.stalenessPolicy,
        auditLogger: options.auditLogger,
      });
      authorizer = new CachedProofAuthorizer(proofCache);
      break;
    case 'gas-limited':
      meter = new EpochGasMeter(
        options.verifier,
        stores.quotas ?? new InMemoryGasQuotaStore(),
        stores.epochs ?? new InMemoryEpochStore(),
        {
          epochDuration: options.epochDuration ?? DEFAULT_EPOCH_DURATION,
          firstEpochTimestamp: options.firstEpochTimestamp ?? clock(),
          auditLogger: options.auditLogger,
        },
      );
      authorizer = new NullifierQuotaAuthorizer(options.verifier, meter);
      break;
    case 'policy':
      if (!options.policy || !options.address) {
        throw new SponsorConfigError("The 'policy' paymaster requires both policy and address");
      }
      authorizer = new PolicyDelegateAuthorizer(options.policy, options.address);
      break;
  }

  return new SponsorPaymaster({
    ledger,
    escrow,
    pipeline: new ValidationPipeline(ledger, authorizer, options.auditLogger),
    settlement: new SettlementHandler(ledger, meter, options.auditLogger),
    clock,
    meter,
    proofCache,
  });
}
