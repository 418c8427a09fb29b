/**
 * In-process membership verifier.
 *
 * Stands in for the on-chain Semaphore contract: it owns the groups, their
 * admins and Merkle trees, and decides whether a membership proof is valid.
 * Root validity follows Semaphore's rule: a proof is accepted against the
 * current root, or against an earlier root for `merkleTreeDuration` seconds
 * after that root was created. Checking the Groth16 points themselves is
 * delegated to a {@link ProofPointsCheck}; the default accepts every proof,
 * which is what a deployment with an always-valid verifier does.
 */

import { MembershipTree } from './membership-tree';
import { SponsorAccessError, SponsorErrorCode, SponsorValidationError } from './errors';
import { Address, Clock, ProofVerifierClient, SemaphoreProof, systemClock } from './types';
import { MAX_TREE_DEPTH, MIN_TREE_DEPTH, normalizeAddress } from './validation';

/** Default validity window of a replaced root (1 hour, as in Semaphore). */
export const DEFAULT_MERKLE_TREE_DURATION = 60 * 60;

/**
 * Verifies the Groth16 points of a proof for its public signals.
 */
export type ProofPointsCheck = (groupId: bigint, proof: SemaphoreProof) => Promise<boolean>;

export const acceptAllPoints: ProofPointsCheck = async () => true;

export interface InMemoryGroupVerifierOptions {
  /** Seconds an old root stays valid after it was created */
  merkleTreeDuration?: number;
  /** Time source for root expiry */
  clock?: Clock;
  /** Depth of each group's tree (default 10) */
  treeDepth?: number;
  /** Groth16 points check */
  pointsCheck?: ProofPointsCheck;
}

interface GroupRecord {
  admin: Address;
  tree: MembershipTree;
  /** root -> creation time in seconds */
  rootCreatedAt: Map<bigint, number>;
}

export class InMemoryGroupVerifier implements ProofVerifierClient {
  private groups = new Map<bigint, GroupRecord>();
  private nextGroupId = 0n;
  private readonly merkleTreeDuration: number;
  private readonly clock: Clock;
  private readonly treeDepth?: number;
  private readonly pointsCheck: ProofPointsCheck;

  constructor(options: InMemoryGroupVerifierOptions = {}) {
    this.merkleTreeDuration = options.merkleTreeDuration ?? DEFAULT_MERKLE_TREE_DURATION;
    this.clock = options.clock ?? systemClock;
    this.treeDepth = options.treeDepth;
    this.pointsCheck = options.pointsCheck ?? acceptAllPoints;

    if (!Number.isInteger(this.merkleTreeDuration) || this.merkleTreeDuration < 0) {
      throw new SponsorValidationError(
        'merkleTreeDuration must be a non-negative integer',
        'merkleTreeDuration',
      );
    }
  }

  /**
   * Create a group administered by `admin`. Group ids are assigned
   * sequentially from 0.
   */
  async createGroup(admin: Address): Promise<bigint> {
    const groupId = this.nextGroupId;
    this.nextGroupId += 1n;

    const tree = new MembershipTree(this.treeDepth);
    const record: GroupRecord = {
      admin: normalizeAddress(admin, 'admin'),
      tree,
      rootCreatedAt: new Map(),
    };
    record.rootCreatedAt.set(await tree.getRoot(), this.clock());
    this.groups.set(groupId, record);
    return groupId;
  }

  async addMember(caller: Address, groupId: bigint, commitment: bigint): Promise<void> {
    await this.addMembers(caller, groupId, [commitment]);
  }

  async addMembers(caller: Address, groupId: bigint, commitments: bigint[]): Promise<void> {
    const group = this.requireAdmin(caller, groupId);
    for (const commitment of commitments) {
      await group.tree.add(commitment);
    }
    await this.recordRoot(group);
  }

  async removeMember(caller: Address, groupId: bigint, commitment: bigint): Promise<void> {
    const group = this.requireAdmin(caller, groupId);
    if (await group.tree.remove(commitment)) {
      await this.recordRoot(group);
    }
  }

  async updateGroupAdmin(caller: Address, groupId: bigint, newAdmin: Address): Promise<void> {
    const group = this.requireAdmin(caller, groupId);
    group.admin = normalizeAddress(newAdmin, 'newAdmin');
  }

  async hasMember(groupId: bigint, commitment: bigint): Promise<boolean> {
    return this.requireGroup(groupId).tree.contains(commitment);
  }

  // -------------------------------------------------------------------------
  // ProofVerifierClient
  // -------------------------------------------------------------------------

  async verifyProof(groupId: bigint, proof: SemaphoreProof): Promise<boolean> {
    const group = this.groups.get(groupId);
    if (!group) {
      return false;
    }
    if (
      proof.merkleTreeDepth < BigInt(MIN_TREE_DEPTH) ||
      proof.merkleTreeDepth > BigInt(MAX_TREE_DEPTH)
    ) {
      return false;
    }

    const currentRoot = await group.tree.getRoot();
    if (proof.merkleTreeRoot !== currentRoot) {
      const createdAt = group.rootCreatedAt.get(proof.merkleTreeRoot);
      if (createdAt === undefined) {
        return false;
      }
      if (this.clock() > createdAt + this.merkleTreeDuration) {
        return false;
      }
    }

    return this.pointsCheck(groupId, proof);
  }

  async getMerkleTreeRoot(groupId: bigint): Promise<bigint> {
    return this.requireGroup(groupId).tree.getRoot();
  }

  async getGroupAdmin(groupId: bigint): Promise<Address | null> {
    return this.groups.get(groupId)?.admin ?? null;
  }

  // -------------------------------------------------------------------------

  private requireGroup(groupId: bigint): GroupRecord {
    const group = this.groups.get(groupId);
    if (!group) {
      throw new SponsorValidationError(
        `Group '${groupId}' not found`,
        'groupId',
        SponsorErrorCode.UNKNOWN_GROUP,
      );
    }
    return group;
  }

  private requireAdmin(caller: Address, groupId: bigint): GroupRecord {
    const group = this.requireGroup(groupId);
    if (normalizeAddress(caller, 'caller') !== group.admin) {
      throw new SponsorAccessError(
        `Caller is not the admin of group '${groupId}'`,
        caller,
        SponsorErrorCode.NOT_GROUP_ADMIN,
      );
    }
    return group;
  }

  private async recordRoot(group: GroupRecord): Promise<void> {
    group.rootCreatedAt.set(await group.tree.getRoot(), this.clock());
  }
}
