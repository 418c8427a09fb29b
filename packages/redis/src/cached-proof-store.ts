import { cacheKey } from '@gas-sponsor/core';
import type { Address, CachedProof, CachedProofStore, SemaphoreProof } from '@gas-sponsor/core';
import type { RedisClient, RedisStoreOptions } from './types';
import {
  parseRecord,
  readBigInt,
  readBigIntArray,
  readBoolean,
  readObject,
  readString,
  resolveKeyPrefix,
  stringify,
} from './codec';

/**
 * Redis-backed proof cache. Entries are stored as JSON under
 * `<prefix><member>:<groupId>` (member lowercased).
 */
export class RedisCachedProofStore implements CachedProofStore {
  private readonly client: RedisClient;
  private readonly keyPrefix: string;

  constructor(client: RedisClient, options: RedisStoreOptions = {}) {
    this.client = client;
    this.keyPrefix = resolveKeyPrefix(options.keyPrefix, 'gas-sponsor:proof:');
  }

  async get(member: Address, groupId: bigint): Promise<CachedProof | null> {
    const value = await this.client.get(this.keyPrefix + cacheKey(member, groupId));
    if (value === null) {
      return null;
    }

    const stored = parseRecord(value, 'cached proof');
    const proof = readObject(stored, 'proof');
    const decoded: SemaphoreProof = {
      merkleTreeDepth: readBigInt(proof, 'merkleTreeDepth'),
      merkleTreeRoot: readBigInt(proof, 'merkleTreeRoot'),
      nullifier: readBigInt(proof, 'nullifier'),
      message: readBigInt(proof, 'message'),
      scope: readBigInt(proof, 'scope'),
      points: readBigIntArray(proof, 'points'),
    };

    return {
      member: readString(stored, 'member'),
      groupId: readBigInt(stored, 'groupId'),
      proof: decoded,
      merkleRootAtCache: readBigInt(stored, 'merkleRootAtCache'),
      isValid: readBoolean(stored, 'isValid'),
    };
  }

  async set(entry: CachedProof): Promise<void> {
    await this.client.set(this.keyPrefix + cacheKey(entry.member, entry.groupId), stringify(entry));
  }
}
