import { expect } from 'chai';
import {
  ProofCache,
  SponsorConfigError,
  SponsorValidationError,
  createPaymaster,
  encodeSponsorPayload,
  computeGroupScope,
  computeMessageBinding,
  SemaphoreProof,
} from '@gas-sponsor/core';
import { RedisGroupDepositStore } from '../src/deposit-store';
import { RedisCachedProofStore } from '../src/cached-proof-store';
import { RedisGasQuotaStore } from '../src/gas-quota-store';
import { RedisEpochStore } from '../src/epoch-store';
import { MockRedisClient } from './mock-redis';

const MEMBER = '0x2222222222222222222222222222222222222222';

function proofFor(groupId: bigint): SemaphoreProof {
  return {
    merkleTreeDepth: 16n,
    merkleTreeRoot: 100n,
    nullifier: 42n,
    message: computeMessageBinding(MEMBER, 0n),
    scope: computeGroupScope(groupId),
    points: [1n, 2n, 3n, 4n, 5n, 6n, 7n, 8n],
  };
}

describe('Redis stores', () => {
  let client: MockRedisClient;

  beforeEach(() => {
    client = new MockRedisClient();
  });

  describe('RedisGroupDepositStore', () => {
    it('returns null for groups never written', async () => {
      const store = new RedisGroupDepositStore(client);
      expect(await store.getDeposit(5n)).to.equal(null);
    });

    it('stores balances as decimal strings, negatives included', async () => {
      const store = new RedisGroupDepositStore(client, { keyPrefix: 'test:deposit:' });
      await store.setDeposit(5n, -15n);
      expect(client.data.get('test:deposit:5')).to.equal('-15');
      expect(await store.getDeposit(5n)).to.equal(-15n);
    });

    it('fails loudly on a corrupted balance', async () => {
      const store = new RedisGroupDepositStore(client);
      client.data.set('gas-sponsor:deposit:5', 'lots');
      try {
        await store.getDeposit(5n);
        expect.fail('should have thrown');
      } catch (error) {
        expect(error).to.be.instanceOf(SponsorConfigError);
      }
    });

    it('validates the key prefix', () => {
      expect(() => new RedisGroupDepositStore(client, { keyPrefix: '' })).to.throw(SponsorValidationError);
      expect(() => new RedisGroupDepositStore(client, { keyPrefix: 'x'.repeat(129) })).to.throw(
        SponsorValidationError,
        /at most 128/,
      );
    });
  });

  describe('RedisCachedProofStore', () => {
    it('round-trips an entry with bigint fields', async () => {
      const store = new RedisCachedProofStore(client);
      const entry = {
        member: MEMBER,
        groupId: 5n,
        proof: proofFor(5n),
        merkleRootAtCache: 100n,
        isValid: true,
      };
      await store.set(entry);

      expect(client.data.has(`gas-sponsor:proof:${MEMBER}:5`)).to.equal(true);
      expect(await store.get(MEMBER, 5n)).to.deep.equal(entry);
      expect(await store.get(MEMBER, 6n)).to.equal(null);
    });

    it('rejects entries with missing fields', async () => {
      const store = new RedisCachedProofStore(client);
      client.data.set(`gas-sponsor:proof:${MEMBER}:5`, JSON.stringify({ member: MEMBER, groupId: '5' }));
      try {
        await store.get(MEMBER, 5n);
        expect.fail('should have thrown');
      } catch (error) {
        expect(error).to.be.instanceOf(SponsorConfigError);
        expect(error).to.have.property('message', "Stored field 'proof' is not an object");
      }
    });

    it('rejects values that are not JSON', async () => {
      const store = new RedisCachedProofStore(client);
      client.data.set(`gas-sponsor:proof:${MEMBER}:5`, '{not json');
      try {
        await store.get(MEMBER, 5n);
        expect.fail('should have thrown');
      } catch (error) {
        expect(error).to.be.instanceOf(SponsorConfigError);
        expect(error).to.have.property('message').that.matches(/^Failed to parse cached proof from Redis/);
      }
    });

    it('backs a proof cache', async () => {
      const verifier = {
        verifyProof: async () => true,
        getMerkleTreeRoot: async () => 100n,
        getGroupAdmin: async () => null,
      };
      const cache = new ProofCache(verifier, new RedisCachedProofStore(client));
      const proof = proofFor(5n);
      await cache.submitNew(MEMBER, 5n, proof, proof.message);

      const reloaded = new ProofCache(verifier, new RedisCachedProofStore(client));
      expect(await reloaded.useCached(MEMBER, 5n)).to.deep.equal({ ok: true, merkleRoot: 100n });
    });
  });

  describe('RedisGasQuotaStore', () => {
    it('round-trips usage records and quotas', async () => {
      const store = new RedisGasQuotaStore(client);
      const record = { groupId: 5n, gasUsed: 10n, reserved: 3n, lastMerkleRoot: 100n, epoch: 2n };

      expect(await store.getRecord(42n)).to.equal(null);
      expect(await store.getQuota(5n)).to.equal(null);

      await store.setRecord(42n, record);
      await store.setQuota(5n, 1_000n);

      expect(await store.getRecord(42n)).to.deep.equal(record);
      expect(await store.getQuota(5n)).to.equal(1_000n);
      expect(client.data.get('gas-sponsor:quota:5')).to.equal('1000');
    });

    it('keeps records and quotas under separate prefixes', async () => {
      const store = new RedisGasQuotaStore(client, { keyPrefix: 'a:', quotaKeyPrefix: 'b:' });
      await store.setQuota(7n, 1n);
      await store.setRecord(7n, { groupId: 7n, gasUsed: 0n, reserved: 0n, lastMerkleRoot: 0n, epoch: 0n });
      expect([...client.data.keys()].sort()).to.deep.equal(['a:7', 'b:7']);
    });
  });

  describe('RedisEpochStore', () => {
    it('round-trips the epoch state', async () => {
      const store = new RedisEpochStore(client);
      expect(await store.getState()).to.equal(null);

      const state = { firstEpochTimestamp: 1_700_000_000n, epochDuration: 86_400n, currentEpoch: 3n };
      await store.setState(state);
      expect(await store.getState()).to.deep.equal(state);
      expect(client.data.get('gas-sponsor:epoch')).to.equal(
        '{"firstEpochTimestamp":"1700000000","epochDuration":"86400","currentEpoch":"3"}',
      );
    });
  });

  describe('paymaster on Redis stores', () => {
    it('keeps balances across paymaster instances', async () => {
      const verifier = {
        verifyProof: async () => true,
        getMerkleTreeRoot: async () => 100n,
        getGroupAdmin: async () => null,
      };
      const stores = () => ({
        deposits: new RedisGroupDepositStore(client),
        proofs: new RedisCachedProofStore(client),
      });

      const first = createPaymaster({ variant: 'cached', verifier, stores: stores() });
      await first.depositForGroup(5n, 1_000n);
      const op = {
        sender: MEMBER,
        nonce: 0n,
        paymasterData: encodeSponsorPayload({ mode: 'new', groupId: 5n, proof: proofFor(5n) }),
      };
      const { context } = await first.validatePaymasterUserOp(op, 100n);
      await first.postOp('opSucceeded', context, 40n);

      const second = createPaymaster({ variant: 'cached', verifier, stores: stores() });
      expect(await second.groupDeposits(5n)).to.equal(960n);
      const cached = {
        sender: MEMBER,
        nonce: 1n,
        paymasterData: encodeSponsorPayload({ mode: 'cached', groupId: 5n }),
      };
      expect(await second.validate(cached, 100n)).to.have.property('status', 'approved');
    });
  });
});
