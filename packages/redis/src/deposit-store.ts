import type { GroupDepositStore } from '@gas-sponsor/core';
import type { RedisClient, RedisStoreOptions } from './types';
import { parseBigInt, resolveKeyPrefix } from './codec';

/**
 * Redis-backed group balances. One key per group holding the balance as a
 * decimal string (it may be negative after an underflowing settlement).
 */
export class RedisGroupDepositStore implements GroupDepositStore {
  private readonly client: RedisClient;
  private readonly keyPrefix: string;

  constructor(client: RedisClient, options: RedisStoreOptions = {}) {
    this.client = client;
    this.keyPrefix = resolveKeyPrefix(options.keyPrefix, 'gas-sponsor:deposit:');
  }

  async getDeposit(groupId: bigint): Promise<bigint | null> {
    const value = await this.client.get(this.keyPrefix + groupId.toString());
    return value === null ? null : parseBigInt(value, 'deposit');
  }

  async setDeposit(groupId: bigint, amount: bigint): Promise<void> {
    await this.client.set(this.keyPrefix + groupId.toString(), amount.toString());
  }
}
