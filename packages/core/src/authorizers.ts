/**
 * Proof authorization strategies.
 *
 * The validation pipeline is the same for every paymaster variant; what
 * differs is how a decoded payload is turned into an authorization. Each
 * variant is a {@link ProofAuthorizer} chosen when the paymaster is built:
 *
 *   - {@link DirectVerifyAuthorizer}: verify every proof, remember nothing
 *   - {@link CachedProofAuthorizer}: verify once per member, then reuse
 *   - {@link NullifierQuotaAuthorizer}: per-epoch gas quota keyed by nullifier
 *   - {@link PolicyDelegateAuthorizer}: delegate the decision to a policy
 */

import { computeEpochScope, computeGroupScope, computeMessageBinding } from './binding';
import { EpochGasMeter } from './epoch-gas-meter';
import { RejectionReason, RejectionReasonType } from './errors';
import { SponsorshipPolicy } from './policy';
import { ProofCache } from './proof-cache';
import {
  Address,
  ProofVerifierClient,
  SemaphoreProof,
  SponsorPayload,
  ValidationContext,
} from './types';
import { normalizeAddress } from './validation';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type AuthorizerKind = 'direct' | 'cached' | 'gas-limited' | 'policy';

export interface AuthorizationRequest {
  /** Checksummed sender of the operation */
  sender: Address;
  nonce: bigint;
  payload: SponsorPayload;
  /** Pre-fund the operation is authorized against */
  requiredPreFund: bigint;
}

export type AuthorizationOutcome =
  | { ok: true; context: ValidationContext }
  | { ok: false; reason: RejectionReasonType };

export interface ProofAuthorizer {
  readonly kind: AuthorizerKind;
  authorize(request: AuthorizationRequest): Promise<AuthorizationOutcome>;
}

function reject(reason: RejectionReasonType): AuthorizationOutcome {
  return { ok: false, reason };
}

/**
 * Check that a proof is bound to the operation's sender and nonce and to the
 * expected scope. Returns the failed binding, or null.
 */
export function checkBindings(
  request: AuthorizationRequest,
  proof: SemaphoreProof,
  expectedScope: bigint,
): RejectionReasonType | null {
  if (proof.message !== computeMessageBinding(request.sender, request.nonce)) {
    return RejectionReason.INVALID_MESSAGE_BINDING;
  }
  if (proof.scope !== expectedScope) {
    return RejectionReason.INVALID_SCOPE_BINDING;
  }
  return null;
}

// ---------------------------------------------------------------------------
// Direct verification
// ---------------------------------------------------------------------------

export class DirectVerifyAuthorizer implements ProofAuthorizer {
  readonly kind = 'direct';
  private readonly verifier: ProofVerifierClient;

  constructor(verifier: ProofVerifierClient) {
    this.verifier = verifier;
  }

  async authorize(request: AuthorizationRequest): Promise<AuthorizationOutcome> {
    const { payload } = request;
    if (payload.mode !== 'new') {
      return reject(RejectionReason.UNSUPPORTED_MODE);
    }

    const binding = checkBindings(request, payload.proof, computeGroupScope(payload.groupId));
    if (binding) {
      return reject(binding);
    }
    if (!(await this.verifier.verifyProof(payload.groupId, payload.proof))) {
      return reject(RejectionReason.PROOF_REJECTED);
    }
    return { ok: true, context: { groupId: payload.groupId } };
  }
}

// ---------------------------------------------------------------------------
// Per-member proof cache
// ---------------------------------------------------------------------------

export class CachedProofAuthorizer implements ProofAuthorizer {
  readonly kind = 'cached';
  private readonly cache: ProofCache;

  constructor(cache: ProofCache) {
    this.cache = cache;
  }

  async authorize(request: AuthorizationRequest): Promise<AuthorizationOutcome> {
    const { payload, sender } = request;

    if (payload.mode === 'cached') {
      if (payload.nullifier !== undefined) {
        return reject(RejectionReason.MALFORMED_PAYLOAD);
      }
      const verdict = await this.cache.useCached(sender, payload.groupId);
      return verdict.ok ? { ok: true, context: { groupId: payload.groupId } } : reject(verdict.reason);
    }

    const binding = checkBindings(request, payload.proof, computeGroupScope(payload.groupId));
    if (binding) {
      return reject(binding);
    }
    const verdict = await this.cache.submitNew(
      sender,
      payload.groupId,
      payload.proof,
      computeMessageBinding(sender, request.nonce),
    );
    return verdict.ok ? { ok: true, context: { groupId: payload.groupId } } : reject(verdict.reason);
  }
}

// ---------------------------------------------------------------------------
// Per-nullifier epoch quota
// ---------------------------------------------------------------------------

export class NullifierQuotaAuthorizer implements ProofAuthorizer {
  readonly kind = 'gas-limited';
  private readonly verifier: ProofVerifierClient;
  private readonly meter: EpochGasMeter;

  constructor(verifier: ProofVerifierClient, meter: EpochGasMeter) {
    this.verifier = verifier;
    this.meter = meter;
  }

  async authorize(request: AuthorizationRequest): Promise<AuthorizationOutcome> {
    const { payload, requiredPreFund } = request;
    const { groupId } = payload;
    let nullifier: bigint;

    if (payload.mode === 'new') {
      const epoch = await this.meter.currentEpoch();
      const binding = checkBindings(request, payload.proof, computeEpochScope(groupId, epoch));
      if (binding) {
        return reject(binding);
      }
      if (!(await this.verifier.verifyProof(groupId, payload.proof))) {
        return reject(RejectionReason.PROOF_REJECTED);
      }
      nullifier = payload.proof.nullifier;
    } else {
      if (payload.nullifier === undefined) {
        return reject(RejectionReason.MALFORMED_PAYLOAD);
      }
      nullifier = payload.nullifier;

      const record = await this.meter.gasData(nullifier);
      if (!record || record.groupId !== groupId) {
        return reject(RejectionReason.NO_CACHED_PROOF);
      }
      if (record.lastMerkleRoot !== (await this.verifier.getMerkleTreeRoot(groupId))) {
        return reject(RejectionReason.STALE_CACHED_PROOF);
      }
    }

    const admission = await this.meter.admit(nullifier, groupId, requiredPreFund);
    if (!admission.ok) {
      return reject(admission.reason);
    }

    const merkleRoot = await this.verifier.getMerkleTreeRoot(groupId);
    const record = await this.meter.commitAdmission(nullifier, groupId, merkleRoot, requiredPreFund);
    return {
      ok: true,
      context: { groupId, quota: { nullifier, reserved: requiredPreFund, epoch: record.epoch } },
    };
  }
}

// ---------------------------------------------------------------------------
// Delegation to an external policy
// ---------------------------------------------------------------------------

/**
 * Delegates membership decisions to a {@link SponsorshipPolicy}.
 *
 * NOTE: evidence is not tracked for uniqueness here. The validation phase has
 * no durable writes until the whole operation's outcome is known, so the same
 * proof may sponsor any number of operations. Do not add a nullifier check
 * without changing that contract.
 */
export class PolicyDelegateAuthorizer implements ProofAuthorizer {
  readonly kind = 'policy';
  private readonly policy: SponsorshipPolicy;
  private readonly self: Address;

  /**
   * @param self - Address the paymaster enforces the policy as (its target)
   */
  constructor(policy: SponsorshipPolicy, self: Address) {
    this.policy = policy;
    this.self = normalizeAddress(self, 'self');
  }

  async authorize(request: AuthorizationRequest): Promise<AuthorizationOutcome> {
    const { payload, sender } = request;
    if (payload.mode !== 'new') {
      return reject(RejectionReason.UNSUPPORTED_MODE);
    }

    const binding = checkBindings(request, payload.proof, computeGroupScope(payload.groupId));
    if (binding) {
      return reject(binding);
    }

    const allowed = await this.policy.enforce(this.self, sender, {
      groupId: payload.groupId,
      proof: payload.proof,
    });
    if (!allowed) {
      return reject(RejectionReason.POLICY_REJECTED);
    }
    return { ok: true, context: { groupId: payload.groupId } };
  }
}
