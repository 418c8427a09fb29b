/**
 * Per-member cache of verified membership proofs.
 *
 * A member who has proven membership once can be sponsored again without
 * sending (and the verifier re-checking) a full proof. The cache is keyed by
 * member address and group, so an entry is only usable by the address that
 * created it.
 *
 * Membership changes move the group's Merkle root. What happens to an entry
 * cached against an older root is the staleness policy:
 *
 *   - `reverify` (default): the stored proof is checked again. The verifier
 *     keeps accepting a replaced root for a limited window, so the entry keeps
 *     working until that window closes, at which point it is marked invalid.
 *   - `pinned`: any root change invalidates the entry for use; the member must
 *     submit a fresh proof.
 */

import {
  RejectionReason,
  RejectionReasonType,
  SponsorConfigError,
  SponsorErrorCode,
  SponsorProofError,
} from './errors';
import {
  Address,
  auditEntry,
  AuditLogger,
  CachedProof,
  CachedProofStore,
  ProofVerifierClient,
  SemaphoreProof,
} from './types';

export type StalenessPolicy = 'reverify' | 'pinned';

export const STALENESS_POLICIES: readonly StalenessPolicy[] = ['reverify', 'pinned'];

/**
 * @throws SponsorConfigError if the value names no policy
 */
export function parseStalenessPolicy(value: string): StalenessPolicy {
  const policy = STALENESS_POLICIES.find((candidate) => candidate === value);
  if (policy === undefined) {
    throw new SponsorConfigError(
      `stalenessPolicy must be one of ${STALENESS_POLICIES.join(', ')} (got '${value}')`,
    );
  }
  return policy;
}

export type CacheVerdict =
  | { ok: true; merkleRoot: bigint }
  | { ok: false; reason: RejectionReasonType };

export interface ProofCacheOptions {
  /** What to do when the group root moved since caching (default: 'reverify') */
  stalenessPolicy?: StalenessPolicy;
  auditLogger?: AuditLogger;
}

export class ProofCache {
  private readonly verifier: ProofVerifierClient;
  private readonly store: CachedProofStore;
  readonly stalenessPolicy: StalenessPolicy;
  private readonly auditLogger?: AuditLogger;

  constructor(verifier: ProofVerifierClient, store: CachedProofStore, options: ProofCacheOptions = {}) {
    this.verifier = verifier;
    this.store = store;
    this.stalenessPolicy = options.stalenessPolicy ?? 'reverify';
    this.auditLogger = options.auditLogger;

    if (!STALENESS_POLICIES.includes(this.stalenessPolicy)) {
      throw new SponsorConfigError(
        `stalenessPolicy must be one of ${STALENESS_POLICIES.join(', ')}`,
      );
    }
  }

  /**
   * Verify a fresh proof and remember it for the member.
   *
   * @param expectedMessage - Binding of the operation being sponsored; the
   *   proof's message must equal it
   */
  async submitNew(
    member: Address,
    groupId: bigint,
    proof: SemaphoreProof,
    expectedMessage: bigint,
  ): Promise<CacheVerdict> {
    if (proof.message !== expectedMessage) {
      return { ok: false, reason: RejectionReason.INVALID_MESSAGE_BINDING };
    }

    if (!(await this.verifier.verifyProof(groupId, proof))) {
      return { ok: false, reason: RejectionReason.PROOF_REJECTED };
    }

    const merkleRoot = await this.verifier.getMerkleTreeRoot(groupId);
    await this.store.set({
      member,
      groupId,
      proof,
      merkleRootAtCache: merkleRoot,
      isValid: true,
    });

    this.auditLogger?.log(
      auditEntry('cache_proof', 'proof-cache', true, member, { groupId, merkleRoot }),
    );
    return { ok: true, merkleRoot };
  }

  /**
   * Authorize a member from its cached proof.
   *
   * @throws SponsorProofError (code CORRUPT_PROOF_RECORD) if the store returns
   *   an entry filed for another member or group
   */
  async useCached(member: Address, groupId: bigint): Promise<CacheVerdict> {
    const entry = await this.store.get(member, groupId);
    if (!entry || !entry.isValid) {
      return { ok: false, reason: RejectionReason.NO_CACHED_PROOF };
    }
    if (entry.groupId !== groupId || cacheKey(entry.member, entry.groupId) !== cacheKey(member, groupId)) {
      throw new SponsorProofError(
        `Cached proof stored under ${cacheKey(member, groupId)} belongs to ${cacheKey(entry.member, entry.groupId)}`,
        SponsorErrorCode.CORRUPT_PROOF_RECORD,
      );
    }

    const currentRoot = await this.verifier.getMerkleTreeRoot(groupId);
    if (entry.merkleRootAtCache === currentRoot) {
      return { ok: true, merkleRoot: currentRoot };
    }

    if (this.stalenessPolicy === 'pinned') {
      return { ok: false, reason: RejectionReason.STALE_CACHED_PROOF };
    }

    const stillValid = await this.verifier.verifyProof(groupId, entry.proof);
    await this.store.set({
      ...entry,
      merkleRootAtCache: stillValid ? currentRoot : entry.merkleRootAtCache,
      isValid: stillValid,
    });

    this.auditLogger?.log(
      auditEntry('reverify', 'proof-cache', stillValid, member, {
        groupId,
        previousRoot: entry.merkleRootAtCache,
        currentRoot,
      }),
    );

    if (!stillValid) {
      return { ok: false, reason: RejectionReason.STALE_CACHED_PROOF };
    }
    return { ok: true, merkleRoot: currentRoot };
  }

  async getCachedProof(member: Address, groupId: bigint): Promise<CachedProof | null> {
    return this.store.get(member, groupId);
  }
}

// ---------------------------------------------------------------------------
// In-memory CachedProofStore
// ---------------------------------------------------------------------------

export class InMemoryCachedProofStore implements CachedProofStore {
  private entries = new Map<string, CachedProof>();

  constructor() {
    if (typeof process !== 'undefined' && process.env.NODE_ENV === 'production') {
      console.warn(
        '[gas-sponsor] InMemoryCachedProofStore is not suitable for production. ' +
          'Cached proofs will be lost on restart. Use a persistent store (Redis).',
      );
    }
  }

  async get(member: Address, groupId: bigint): Promise<CachedProof | null> {
    const entry = this.entries.get(cacheKey(member, groupId));
    return entry ? { ...entry, proof: { ...entry.proof, points: [...entry.proof.points] } } : null;
  }

  async set(entry: CachedProof): Promise<void> {
    this.entries.set(cacheKey(entry.member, entry.groupId), {
      ...entry,
      proof: { ...entry.proof, points: [...entry.proof.points] },
    });
  }
}

/** Composite key member ‖ group. Addresses are compared case-insensitively. */
export function cacheKey(member: Address, groupId: bigint): string {
  return `${member.toLowerCase()}:${groupId.toString()}`;
}
