import { hashMerkleNode } from './poseidon';
import { SponsorConfigError } from './errors';
import { MAX_TREE_DEPTH as MAX_PROOF_TREE_DEPTH } from './validation';

const DEFAULT_TREE_DEPTH = 10;
const MAX_TREE_DEPTH = Math.min(20, MAX_PROOF_TREE_DEPTH);

/**
 * In-memory Merkle tree of identity commitments with incremental updates.
 *
 * Maintains cached layers and only recomputes the affected path on mutations,
 * so each insert or removal costs O(depth) hashes and reading the root is O(1).
 */
export class MembershipTree {
  private leaves: bigint[] = [];
  private indexByCommitment = new Map<bigint, number>();
  private freeIndices: number[] = [];
  readonly depth: number;

  private layers: bigint[][] = [];
  private zeroHashes: bigint[] = [];
  private ready: Promise<void>;

  constructor(depth: number = DEFAULT_TREE_DEPTH) {
    if (!Number.isInteger(depth) || depth < 1 || depth > MAX_TREE_DEPTH) {
      throw new SponsorConfigError(`Invalid Merkle depth ${depth}. Use 1..${MAX_TREE_DEPTH}.`);
    }
    this.depth = depth;
    this.ready = this.initialize();
  }

  private async initialize(): Promise<void> {
    // Zero hashes for empty subtrees at each level
    this.zeroHashes = [0n];
    for (let i = 0; i < this.depth; i++) {
      const prevZero = this.zeroHashes[i];
      this.zeroHashes.push(await hashMerkleNode(prevZero, prevZero));
    }

    const totalLeaves = 1 << this.depth;
    this.layers = [new Array<bigint>(totalLeaves).fill(0n)];

    for (let level = 0; level < this.depth; level++) {
      const nextLayerSize = this.layers[level].length / 2;
      this.layers.push(new Array<bigint>(nextLayerSize).fill(this.zeroHashes[level + 1]));
    }
  }

  /**
   * Insert a commitment. Returns false if it was already present.
   */
  async add(commitment: bigint): Promise<boolean> {
    await this.ready;

    if (this.indexByCommitment.has(commitment)) {
      return false;
    }
    if (commitment === 0n) {
      throw new SponsorConfigError('Identity commitment must be non-zero');
    }

    const maxLeaves = 1 << this.depth;
    if (this.leaves.length >= maxLeaves && this.freeIndices.length === 0) {
      throw new SponsorConfigError('Membership tree is full for configured depth.');
    }

    const reuseIndex = this.freeIndices.pop();
    const index = reuseIndex !== undefined ? reuseIndex : this.leaves.length;
    if (index === this.leaves.length) {
      this.leaves.push(commitment);
    } else {
      this.leaves[index] = commitment;
    }
    this.indexByCommitment.set(commitment, index);

    this.layers[0][index] = commitment;
    await this.updatePath(index);
    return true;
  }

  /**
   * Remove a commitment. Returns false if it was not present.
   */
  async remove(commitment: bigint): Promise<boolean> {
    await this.ready;

    const index = this.indexByCommitment.get(commitment);
    if (index === undefined) {
      return false;
    }

    this.leaves[index] = 0n;
    this.indexByCommitment.delete(commitment);
    this.freeIndices.push(index);

    this.layers[0][index] = 0n;
    await this.updatePath(index);
    return true;
  }

  contains(commitment: bigint): boolean {
    return this.indexByCommitment.has(commitment);
  }

  async getRoot(): Promise<bigint> {
    await this.ready;
    return this.layers[this.depth][0];
  }

  size(): number {
    return this.indexByCommitment.size;
  }

  /**
   * Recompute the path from a leaf to the root.
   */
  private async updatePath(index: number): Promise<void> {
    let cursor = index;

    for (let level = 0; level < this.depth; level++) {
      const parent = Math.floor(cursor / 2);
      const left = this.layers[level][cursor & ~1];
      const right = this.layers[level][cursor | 1];

      this.layers[level + 1][parent] = await hashMerkleNode(left, right);
      cursor = parent;
    }
  }
}
