// ---------------------------------------------------------------------------
// Primitive aliases
// ---------------------------------------------------------------------------

/** Checksummed 20-byte account address (0x-prefixed hex). */
export type Address = string;

/** 0x-prefixed hex byte string, as carried on the wire. */
export type HexString = string;

/**
 * Source of the current time in seconds. Validation never reads the clock;
 * only administrative transitions such as advancing the epoch do.
 */
export type Clock = () => number;

/** Default clock: wall-clock seconds. */
export const systemClock: Clock = () => Math.floor(Date.now() / 1000);

// ---------------------------------------------------------------------------
// Proofs and payloads
// ---------------------------------------------------------------------------

/**
 * Group membership proof as produced by a Semaphore-style prover.
 * All fields are uint256 values.
 */
export interface SemaphoreProof {
  merkleTreeDepth: bigint;
  /** Root of the membership tree the proof was generated against */
  merkleTreeRoot: bigint;
  /** Per (identity, scope) value; stable across proofs for the same scope */
  nullifier: bigint;
  /** Bound to the sponsored operation's sender and nonce */
  message: bigint;
  /** Bound to the group (and epoch, in the quota-aware variant) */
  scope: bigint;
  /** Groth16 proof points */
  points: bigint[];
}

/** Mode flag in byte 0 of the authorization payload. */
export const PayloadMode = {
  NEW: 0x00,
  CACHED: 0x01,
} as const;

/** Payload carrying a full proof for verification. */
export interface NewProofPayload {
  mode: 'new';
  groupId: bigint;
  proof: SemaphoreProof;
}

/** Payload referring to state cached by an earlier approved operation. */
export interface CachedReferencePayload {
  mode: 'cached';
  groupId: bigint;
  /** Present only in the quota-aware layout */
  nullifier?: bigint;
}

export type SponsorPayload = NewProofPayload | CachedReferencePayload;

/**
 * The parts of a user operation the sponsor reads. Everything else the
 * bundler carries (call data, gas fields, signature) is opaque here.
 */
export interface UserOperationView {
  sender: Address;
  nonce: bigint;
  /** Authorization payload (mode ‖ groupId ‖ proof-or-reference) */
  paymasterData: HexString;
}

/**
 * Identifies what settlement must debit. Encoded as 32 bytes of group id;
 * when the quota meter is involved it is followed by the 32-byte nullifier and
 * the 32-byte amount reserved against that nullifier's quota.
 */
export interface ValidationContext {
  groupId: bigint;
  quota?: {
    nullifier: bigint;
    reserved: bigint;
    /** Epoch the reservation was made in */
    epoch: bigint;
  };
}

// ---------------------------------------------------------------------------
// Persistent records
// ---------------------------------------------------------------------------

/**
 * A verified proof remembered for a (member, group) pair.
 */
export interface CachedProof {
  member: Address;
  groupId: bigint;
  proof: SemaphoreProof;
  /** Verifier root at the time the proof was last (re-)verified */
  merkleRootAtCache: bigint;
  /** Cleared when a re-verification against a newer root fails */
  isValid: boolean;
}

/**
 * Per-nullifier gas consumption within an epoch.
 */
export interface GasQuotaRecord {
  groupId: bigint;
  /** Cumulative gas cost charged in `epoch` */
  gasUsed: bigint;
  /** Pre-fund held by admitted operations that have not settled yet */
  reserved: bigint;
  /** Verifier root observed when the nullifier was last admitted */
  lastMerkleRoot: bigint;
  epoch: bigint;
}

/**
 * Process-wide epoch configuration and counter.
 */
export interface EpochState {
  /** Start of epoch 0, in seconds */
  firstEpochTimestamp: bigint;
  /** Length of one epoch, in seconds */
  epochDuration: bigint;
  currentEpoch: bigint;
}

// ---------------------------------------------------------------------------
// Store interfaces
// ---------------------------------------------------------------------------
// Every lookup returns null for "absent" rather than a zero-valued record, so
// callers can tell a fresh key from one that was written with zeros.

export interface GroupDepositStore {
  getDeposit(groupId: bigint): Promise<bigint | null>;
  setDeposit(groupId: bigint, amount: bigint): Promise<void>;
}

export interface CachedProofStore {
  get(member: Address, groupId: bigint): Promise<CachedProof | null>;
  set(entry: CachedProof): Promise<void>;
}

export interface GasQuotaStore {
  getRecord(nullifier: bigint): Promise<GasQuotaRecord | null>;
  setRecord(nullifier: bigint, record: GasQuotaRecord): Promise<void>;
  getQuota(groupId: bigint): Promise<bigint | null>;
  setQuota(groupId: bigint, maxGasPerEpoch: bigint): Promise<void>;
}

export interface EpochStore {
  getState(): Promise<EpochState | null>;
  setState(state: EpochState): Promise<void>;
}

// ---------------------------------------------------------------------------
// External collaborators
// ---------------------------------------------------------------------------

/**
 * Zero-knowledge membership verifier. Owns the groups' Merkle roots; this
 * package only reads them.
 */
export interface ProofVerifierClient {
  /** Whether the proof is a valid membership proof for the group */
  verifyProof(groupId: bigint, proof: SemaphoreProof): Promise<boolean>;
  /** Current Merkle root of the group */
  getMerkleTreeRoot(groupId: bigint): Promise<bigint>;
  /** Administrator of the group, or null if the group does not exist */
  getGroupAdmin(groupId: bigint): Promise<Address | null>;
}

/**
 * Escrow holding the funds that actually pay for sponsored execution.
 */
export interface DepositEscrow {
  depositTo(amount: bigint): Promise<void>;
  getDeposit(): Promise<bigint>;
}

// ---------------------------------------------------------------------------
// Audit Logging
// ---------------------------------------------------------------------------

/**
 * Structured audit log entry produced by the paymaster components.
 */
export interface AuditEntry {
  /** ISO 8601 timestamp */
  timestamp: string;
  /** Action that occurred */
  action:
    | 'deposit'
    | 'validate'
    | 'settle'
    | 'settlement_underflow'
    | 'set_quota'
    | 'advance_epoch'
    | 'cache_proof'
    | 'reverify';
  /** Component that produced the entry */
  actor: string;
  /** Target identifier (group id, nullifier, member address) */
  target?: string;
  /** Whether the action succeeded */
  success: boolean;
  /** Additional structured metadata */
  metadata?: Record<string, unknown>;
}

/**
 * Pluggable audit logger interface.
 *
 * Production implementations should write to durable storage. The default
 * `ConsoleAuditLogger` writes JSON to stdout.
 */
export interface AuditLogger {
  /** Record an audit entry */
  log(entry: AuditEntry): void;
}

/** JSON.stringify replacer that writes bigints as decimal strings. */
export function bigintReplacer(_key: string, value: unknown): unknown {
  return typeof value === 'bigint' ? value.toString() : value;
}

/**
 * Console-based audit logger.
 */
export class ConsoleAuditLogger implements AuditLogger {
  log(entry: AuditEntry): void {
    console.log('[AUDIT]', JSON.stringify(entry, bigintReplacer));
  }
}

/**
 * In-memory audit logger that stores entries for inspection (testing).
 */
export class InMemoryAuditLogger implements AuditLogger {
  readonly entries: AuditEntry[] = [];

  constructor() {
    if (typeof process !== 'undefined' && process.env.NODE_ENV === 'production') {
      console.warn(
        '[gas-sponsor] InMemoryAuditLogger is not suitable for production. ' +
          'Audit entries will be lost on restart. Use a persistent audit logger.',
      );
    }
  }

  log(entry: AuditEntry): void {
    this.entries.push(entry);
  }

  /** Return entries filtered by action */
  filter(action: AuditEntry['action']): AuditEntry[] {
    return this.entries.filter((e) => e.action === action);
  }

  /** Most recent entry for an action, if any */
  last(action: AuditEntry['action']): AuditEntry | undefined {
    const matches = this.filter(action);
    return matches[matches.length - 1];
  }

  clear(): void {
    this.entries.length = 0;
  }
}

/** Build an audit entry stamped with the current time. */
export function auditEntry(
  action: AuditEntry['action'],
  actor: string,
  success: boolean,
  target?: string,
  metadata?: Record<string, unknown>,
): AuditEntry {
  return {
    timestamp: new Date().toISOString(),
    action,
    actor,
    target,
    success,
    metadata,
  };
}
