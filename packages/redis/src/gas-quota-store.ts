import type { GasQuotaRecord, GasQuotaStore } from '@gas-sponsor/core';
import type { RedisClient } from './types';
import { parseBigInt, parseRecord, readBigInt, resolveKeyPrefix, stringify } from './codec';

export interface RedisGasQuotaStoreOptions {
  /** Key prefix for per-nullifier usage records (default: "gas-sponsor:gas:") */
  keyPrefix?: string;
  /** Key prefix for per-group quotas (default: "gas-sponsor:quota:") */
  quotaKeyPrefix?: string;
}

/**
 * Redis-backed gas quota store: per-nullifier usage records as JSON and
 * per-group quotas as decimal strings.
 */
export class RedisGasQuotaStore implements GasQuotaStore {
  private readonly client: RedisClient;
  private readonly keyPrefix: string;
  private readonly quotaKeyPrefix: string;

  constructor(client: RedisClient, options: RedisGasQuotaStoreOptions = {}) {
    this.client = client;
    this.keyPrefix = resolveKeyPrefix(options.keyPrefix, 'gas-sponsor:gas:');
    this.quotaKeyPrefix = resolveKeyPrefix(options.quotaKeyPrefix, 'gas-sponsor:quota:');
  }

  async getRecord(nullifier: bigint): Promise<GasQuotaRecord | null> {
    const value = await this.client.get(this.keyPrefix + nullifier.toString());
    if (value === null) {
      return null;
    }
    const stored = parseRecord(value, 'gas record');
    return {
      groupId: readBigInt(stored, 'groupId'),
      gasUsed: readBigInt(stored, 'gasUsed'),
      reserved: readBigInt(stored, 'reserved'),
      lastMerkleRoot: readBigInt(stored, 'lastMerkleRoot'),
      epoch: readBigInt(stored, 'epoch'),
    };
  }

  async setRecord(nullifier: bigint, record: GasQuotaRecord): Promise<void> {
    await this.client.set(this.keyPrefix + nullifier.toString(), stringify(record));
  }

  async getQuota(groupId: bigint): Promise<bigint | null> {
    const value = await this.client.get(this.quotaKeyPrefix + groupId.toString());
    return value === null ? null : parseBigInt(value, 'quota');
  }

  async setQuota(groupId: bigint, maxGasPerEpoch: bigint): Promise<void> {
    await this.client.set(this.quotaKeyPrefix + groupId.toString(), maxGasPerEpoch.toString());
  }
}
