import dotenv from 'dotenv';
import {
  ConsoleAuditLogger,
  InMemoryGroupVerifier,
  MembershipPolicy,
  SemaphoreMembershipChecker,
  SponsorshipPolicy,
  createPaymaster,
} from '@gas-sponsor/core';
import { createApp } from './app';
import { DEV_API_KEY, loadServerConfig } from './config';

dotenv.config();

function main(): void {
  const config = loadServerConfig(process.env);
  const auditLogger = new ConsoleAuditLogger();
  const groups = new InMemoryGroupVerifier();

  console.warn('WARN: groups, deposits and quotas are kept in memory (NOT FOR PRODUCTION)');

  let policy: SponsorshipPolicy | undefined;
  if (config.variant === 'policy' && config.policyGroupId !== undefined && config.paymasterAddress) {
    const membershipPolicy = new MembershipPolicy(
      new SemaphoreMembershipChecker(groups, config.policyGroupId),
      config.paymasterAddress,
    );
    membershipPolicy.setTarget(config.paymasterAddress, config.paymasterAddress);
    policy = membershipPolicy;
  }

  const paymaster = createPaymaster({
    variant: config.variant,
    verifier: groups,
    stalenessPolicy: config.stalenessPolicy,
    epochDuration: config.epochDuration,
    firstEpochTimestamp: config.firstEpochTimestamp,
    policy,
    address: config.paymasterAddress,
    auditLogger,
  });

  const app = createApp(paymaster, config, groups);
  const server = app.listen(config.port, () => {
    console.log(`\nGas Sponsor Paymaster Server`);
    console.log(`   Port: ${config.port}`);
    console.log(`   Variant: ${config.variant}`);
    console.log(`   Environment: ${process.env.NODE_ENV || 'development'}`);
    console.log(`\nEndpoints:`);
    console.log(`   GET  /health                   - Health check`);
    console.log(`   POST /validate                 - Validate a user operation`);
    console.log(`   POST /post-op                  - Settle a validated operation (requires API key)`);
    console.log(`   POST /groups                   - Create a group (requires API key)`);
    console.log(`   POST /groups/:groupId/members  - Add members (requires API key)`);
    console.log(`   POST /groups/:groupId/deposit  - Fund a group (requires API key)`);
    console.log(`   PUT  /groups/:groupId/quota    - Set per-user epoch quota (requires API key)`);
    console.log(`   POST /epoch/advance            - Advance the epoch counter`);
    console.log(`   GET  /groups/:groupId/deposit  - Group balance`);
    console.log(`   GET  /gas/:nullifier           - Gas usage of a nullifier`);
    console.log(`   GET  /epoch                    - Current epoch`);
    console.log(`   GET  /escrow                   - Escrow total`);
    console.log(
      `\nAPI Key: Set X-Api-Key header to ${config.apiKey === DEV_API_KEY ? 'your API key' : '***'}`,
    );
    console.log('');
  });

  function shutdown(signal: string): void {
    console.log(`${signal} received, shutting down gracefully`);
    server.close(() => {
      process.exit(0);
    });
  }

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

try {
  main();
} catch (error) {
  console.error('Failed to start paymaster server:', error);
  process.exit(1);
}
