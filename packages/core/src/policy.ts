/**
 * Capability policies for the policy-delegating paymaster.
 *
 * Instead of verifying proofs itself, the paymaster hands the evidence to a
 * policy deployed separately. A policy is bound to one target (the paymaster
 * allowed to enforce through it) and asks a membership checker whether the
 * evidence proves group membership.
 *
 * Policies here do not record which evidence they have seen. The same proof
 * may authorize any number of operations.
 */

import { SponsorAccessError, SponsorErrorCode } from './errors';
import { Address, ProofVerifierClient, SemaphoreProof } from './types';
import { normalizeAddress } from './validation';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/**
 * Evidence presented by a subject: a membership proof for a group.
 */
export interface PolicyEvidence {
  groupId: bigint;
  proof: SemaphoreProof;
}

/**
 * External capability policy.
 */
export interface SponsorshipPolicy {
  /**
   * Decide whether `subject` is entitled to the capability.
   *
   * @param caller - Contract or service enforcing the policy
   * @throws SponsorAccessError if `caller` may not enforce this policy
   */
  enforce(caller: Address, subject: Address, evidence: PolicyEvidence): Promise<boolean>;
}

/**
 * Decides whether evidence proves what a policy requires.
 */
export interface MembershipChecker {
  check(subject: Address, evidence: PolicyEvidence): Promise<boolean>;
}

// ---------------------------------------------------------------------------
// Implementations
// ---------------------------------------------------------------------------

/**
 * Checks evidence against the membership verifier for one group.
 */
export class SemaphoreMembershipChecker implements MembershipChecker {
  private readonly verifier: ProofVerifierClient;
  readonly groupId: bigint;

  constructor(verifier: ProofVerifierClient, groupId: bigint) {
    this.verifier = verifier;
    this.groupId = groupId;
  }

  async check(_subject: Address, evidence: PolicyEvidence): Promise<boolean> {
    if (evidence.groupId !== this.groupId || evidence.proof.scope !== this.groupId) {
      return false;
    }
    return this.verifier.verifyProof(this.groupId, evidence.proof);
  }
}

/**
 * Policy enforced only by its target, backed by a membership checker.
 *
 * The owner sets the target once; until then no caller may enforce.
 */
export class MembershipPolicy implements SponsorshipPolicy {
  private readonly checker: MembershipChecker;
  private readonly owner: Address;
  private target: Address | null = null;

  constructor(checker: MembershipChecker, owner: Address) {
    this.checker = checker;
    this.owner = normalizeAddress(owner, 'owner');
  }

  /**
   * Bind the policy to the only caller allowed to enforce it.
   *
   * @throws SponsorAccessError if the caller is not the owner or a target is already set
   */
  setTarget(caller: Address, target: Address): void {
    const normalizedCaller = normalizeAddress(caller, 'caller');
    if (normalizedCaller !== this.owner) {
      throw new SponsorAccessError('Only the policy owner may set the target', normalizedCaller);
    }
    if (this.target !== null) {
      throw new SponsorAccessError('Policy target is already set', normalizedCaller);
    }
    this.target = normalizeAddress(target, 'target');
  }

  getTarget(): Address | null {
    return this.target;
  }

  async enforce(caller: Address, subject: Address, evidence: PolicyEvidence): Promise<boolean> {
    const normalizedCaller = normalizeAddress(caller, 'caller');
    if (this.target === null || normalizedCaller !== this.target) {
      throw new SponsorAccessError(
        'Policy may only be enforced by its target',
        normalizedCaller,
        SponsorErrorCode.TARGET_ONLY,
      );
    }
    return this.checker.check(subject, evidence);
  }
}
