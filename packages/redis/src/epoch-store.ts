import type { EpochState, EpochStore } from '@gas-sponsor/core';
import type { RedisClient } from './types';
import { parseRecord, readBigInt, resolveKeyPrefix, stringify } from './codec';

export interface RedisEpochStoreOptions {
  /** Key holding the epoch state (default: "gas-sponsor:epoch") */
  key?: string;
}

/**
 * Redis-backed epoch state, a single JSON key.
 */
export class RedisEpochStore implements EpochStore {
  private readonly client: RedisClient;
  private readonly key: string;

  constructor(client: RedisClient, options: RedisEpochStoreOptions = {}) {
    this.client = client;
    this.key = resolveKeyPrefix(options.key, 'gas-sponsor:epoch');
  }

  async getState(): Promise<EpochState | null> {
    const value = await this.client.get(this.key);
    if (value === null) {
      return null;
    }
    const stored = parseRecord(value, 'epoch state');
    return {
      firstEpochTimestamp: readBigInt(stored, 'firstEpochTimestamp'),
      epochDuration: readBigInt(stored, 'epochDuration'),
      currentEpoch: readBigInt(stored, 'currentEpoch'),
    };
  }

  async setState(state: EpochState): Promise<void> {
    await this.client.set(this.key, stringify(state));
  }
}
