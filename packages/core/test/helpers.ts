import { computeEpochScope, computeGroupScope, computeMessageBinding } from '../src/binding';
import { SponsorErrorCode, SponsorValidationError } from '../src/errors';
import { encodeSponsorPayload } from '../src/payload';
import { Address, ProofVerifierClient, SemaphoreProof, UserOperationView } from '../src/types';

export const ADMIN = '0x1111111111111111111111111111111111111111';
export const ALICE = '0x2222222222222222222222222222222222222222';
export const BOB = '0x3333333333333333333333333333333333333333';
export const PAYMASTER = '0x4444444444444444444444444444444444444444';

/**
 * Verifier stand-in: groups are a root and an admin, and every proof for a
 * known group is accepted unless `verdict` says otherwise.
 */
export class StubVerifier implements ProofVerifierClient {
  readonly roots = new Map<bigint, bigint>();
  readonly admins = new Map<bigint, Address>();
  verdict: (groupId: bigint, proof: SemaphoreProof) => boolean = () => true;
  verifyCalls = 0;

  addGroup(groupId: bigint, root: bigint, admin: Address = ADMIN): void {
    this.roots.set(groupId, root);
    this.admins.set(groupId, admin);
  }

  async verifyProof(groupId: bigint, proof: SemaphoreProof): Promise<boolean> {
    this.verifyCalls += 1;
    if (!this.roots.has(groupId)) {
      return false;
    }
    return this.verdict(groupId, proof);
  }

  async getMerkleTreeRoot(groupId: bigint): Promise<bigint> {
    const root = this.roots.get(groupId);
    if (root === undefined) {
      throw new SponsorValidationError('unknown group', 'groupId', SponsorErrorCode.UNKNOWN_GROUP);
    }
    return root;
  }

  async getGroupAdmin(groupId: bigint): Promise<Address | null> {
    return this.admins.get(groupId) ?? null;
  }
}

export interface ProofOverrides {
  root?: bigint;
  nullifier?: bigint;
  message?: bigint;
  scope?: bigint;
}

/** Proof bound to `sender`/`nonce` and scoped to the whole group. */
export function makeProof(
  sender: Address,
  nonce: bigint,
  groupId: bigint,
  overrides: ProofOverrides = {},
): SemaphoreProof {
  return {
    merkleTreeDepth: 10n,
    merkleTreeRoot: overrides.root ?? 1n,
    nullifier: overrides.nullifier ?? 777n,
    message: overrides.message ?? computeMessageBinding(sender, nonce),
    scope: overrides.scope ?? computeGroupScope(groupId),
    points: [1n, 2n, 3n, 4n, 5n, 6n, 7n, 8n],
  };
}

/** Proof scoped to a group and epoch. */
export function makeEpochProof(
  sender: Address,
  nonce: bigint,
  groupId: bigint,
  epoch: bigint,
  overrides: ProofOverrides = {},
): SemaphoreProof {
  return makeProof(sender, nonce, groupId, { scope: computeEpochScope(groupId, epoch), ...overrides });
}

export function newProofOp(
  sender: Address,
  nonce: bigint,
  groupId: bigint,
  proof: SemaphoreProof,
): UserOperationView {
  return {
    sender,
    nonce,
    paymasterData: encodeSponsorPayload({ mode: 'new', groupId, proof }),
  };
}

export function cachedOp(
  sender: Address,
  nonce: bigint,
  groupId: bigint,
  nullifier?: bigint,
): UserOperationView {
  return {
    sender,
    nonce,
    paymasterData: encodeSponsorPayload({ mode: 'cached', groupId, nullifier }),
  };
}
