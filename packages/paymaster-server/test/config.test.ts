import { expect } from 'chai';
import { SponsorConfigError } from '@gas-sponsor/core';
import { DEFAULT_PORT, DEV_API_KEY, loadServerConfig } from '../src/config';

describe('loadServerConfig', () => {
  it('applies defaults', () => {
    expect(loadServerConfig({})).to.deep.equal({
      port: DEFAULT_PORT,
      apiKey: DEV_API_KEY,
      variant: 'cached',
      stalenessPolicy: 'reverify',
      epochDuration: 86_400,
      corsOrigin: '*',
      rateLimitMax: 100,
      rateLimitWindowMs: 900_000,
    });
  });

  it('reads every variable', () => {
    const config = loadServerConfig({
      PORT: '8080',
      API_KEY: 'test-api-key',
      PAYMASTER_VARIANT: 'gas-limited',
      STALENESS_POLICY: 'pinned',
      EPOCH_DURATION_SECONDS: '3600',
      FIRST_EPOCH_TIMESTAMP: '1700000000',
      CORS_ORIGIN: 'https://example.test',
      RATE_LIMIT_MAX: '10',
      RATE_LIMIT_WINDOW_MS: '1000',
    });
    expect(config).to.deep.equal({
      port: 8080,
      apiKey: 'test-api-key',
      variant: 'gas-limited',
      stalenessPolicy: 'pinned',
      epochDuration: 3600,
      firstEpochTimestamp: 1_700_000_000,
      corsOrigin: 'https://example.test',
      rateLimitMax: 10,
      rateLimitWindowMs: 1000,
    });
  });

  it('rejects unknown variants and policies', () => {
    expect(() => loadServerConfig({ PAYMASTER_VARIANT: 'free' })).to.throw(SponsorConfigError, /PAYMASTER_VARIANT/);
    expect(() => loadServerConfig({ STALENESS_POLICY: 'ignore' })).to.throw(SponsorConfigError, /stalenessPolicy/);
  });

  it('rejects malformed numbers', () => {
    expect(() => loadServerConfig({ PORT: 'http' })).to.throw(SponsorConfigError, /PORT/);
    expect(() => loadServerConfig({ EPOCH_DURATION_SECONDS: '0' })).to.throw(SponsorConfigError, />= 1/);
  });

  it('requires group and address for the policy variant', () => {
    expect(() => loadServerConfig({ PAYMASTER_VARIANT: 'policy' })).to.throw(SponsorConfigError, /POLICY_GROUP_ID/);

    const config = loadServerConfig({
      PAYMASTER_VARIANT: 'policy',
      POLICY_GROUP_ID: '3',
      PAYMASTER_ADDRESS: '0x4444444444444444444444444444444444444444',
    });
    expect(config.policyGroupId).to.equal(3n);
    expect(config.paymasterAddress).to.equal('0x4444444444444444444444444444444444444444');
  });

  it('refuses persistent stores while groups are kept in memory', () => {
    expect(() => loadServerConfig({ REDIS_URL: 'redis://localhost:6379' })).to.throw(
      SponsorConfigError,
      'REDIS_URL is not supported while groups are kept by the in-memory verifier',
    );
  });

  it('refuses the development API key in production', () => {
    expect(() => loadServerConfig({ NODE_ENV: 'production' })).to.throw(SponsorConfigError, /API_KEY/);
  });
});
