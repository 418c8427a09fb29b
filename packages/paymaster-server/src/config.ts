import {
  PAYMASTER_VARIANTS,
  PaymasterVariant,
  SponsorConfigError,
  StalenessPolicy,
  normalizeAddress,
  parseStalenessPolicy,
  parseUint256,
  DEFAULT_EPOCH_DURATION,
  Address,
} from '@gas-sponsor/core';

export const DEFAULT_PORT = 3002;
export const DEV_API_KEY = 'dev-api-key-change-in-production';

export interface ServerConfig {
  port: number;
  apiKey: string;
  variant: PaymasterVariant;
  stalenessPolicy: StalenessPolicy;
  epochDuration: number;
  /** Start of epoch 0; defaults to server start when unset */
  firstEpochTimestamp?: number;
  /** Group the policy variant checks membership of */
  policyGroupId?: bigint;
  /** Address the paymaster acts as towards its policy */
  paymasterAddress?: Address;
  corsOrigin: string;
  rateLimitMax: number;
  rateLimitWindowMs: number;
}

function parseVariant(value: string): PaymasterVariant {
  const variant = PAYMASTER_VARIANTS.find((candidate) => candidate === value);
  if (variant === undefined) {
    throw new SponsorConfigError(
      `PAYMASTER_VARIANT must be one of ${PAYMASTER_VARIANTS.join(', ')} (got '${value}')`,
    );
  }
  return variant;
}

function parseInteger(value: string | undefined, name: string, fallback: number, min: number): number {
  if (value === undefined || value === '') {
    return fallback;
  }
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < min) {
    throw new SponsorConfigError(`${name} must be an integer >= ${min} (got '${value}')`);
  }
  return parsed;
}

/**
 * Read server configuration from environment variables.
 *
 * @throws SponsorConfigError on malformed values (SponsorValidationError for
 *   a malformed POLICY_GROUP_ID or PAYMASTER_ADDRESS)
 */
export function loadServerConfig(env: NodeJS.ProcessEnv): ServerConfig {
  const config: ServerConfig = {
    port: parseInteger(env.PORT, 'PORT', DEFAULT_PORT, 0),
    apiKey: env.API_KEY || DEV_API_KEY,
    variant: parseVariant(env.PAYMASTER_VARIANT || 'cached'),
    stalenessPolicy: parseStalenessPolicy(env.STALENESS_POLICY || 'reverify'),
    epochDuration: parseInteger(env.EPOCH_DURATION_SECONDS, 'EPOCH_DURATION_SECONDS', DEFAULT_EPOCH_DURATION, 1),
    corsOrigin: env.CORS_ORIGIN || '*',
    rateLimitMax: parseInteger(env.RATE_LIMIT_MAX, 'RATE_LIMIT_MAX', 100, 1),
    rateLimitWindowMs: parseInteger(env.RATE_LIMIT_WINDOW_MS, 'RATE_LIMIT_WINDOW_MS', 15 * 60 * 1000, 1),
  };

  // Groups and their ids live in the in-process verifier; persisted balances
  // and quotas would attach to reissued group ids after a restart.
  if (env.REDIS_URL) {
    throw new SponsorConfigError(
      'REDIS_URL is not supported while groups are kept by the in-memory verifier',
    );
  }

  if (env.FIRST_EPOCH_TIMESTAMP) {
    config.firstEpochTimestamp = parseInteger(env.FIRST_EPOCH_TIMESTAMP, 'FIRST_EPOCH_TIMESTAMP', 0, 0);
  }

  if (config.variant === 'policy') {
    if (!env.POLICY_GROUP_ID || !env.PAYMASTER_ADDRESS) {
      throw new SponsorConfigError(
        "PAYMASTER_VARIANT 'policy' requires POLICY_GROUP_ID and PAYMASTER_ADDRESS",
      );
    }
    config.policyGroupId = parseUint256(env.POLICY_GROUP_ID, 'POLICY_GROUP_ID');
    config.paymasterAddress = normalizeAddress(env.PAYMASTER_ADDRESS, 'PAYMASTER_ADDRESS');
  }

  if (env.NODE_ENV === 'production' && config.apiKey === DEV_API_KEY) {
    throw new SponsorConfigError('API_KEY must be set in production');
  }

  return config;
}
