export type { RedisClient, RedisStoreOptions } from './types';
export { RedisGroupDepositStore } from './deposit-store';
export { RedisCachedProofStore } from './cached-proof-store';
export { RedisGasQuotaStore, type RedisGasQuotaStoreOptions } from './gas-quota-store';
export { RedisEpochStore, type RedisEpochStoreOptions } from './epoch-store';
