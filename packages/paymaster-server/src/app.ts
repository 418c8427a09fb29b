import express, { Express, NextFunction, Request, Response } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import rateLimit from 'express-rate-limit';
import {
  GasQuotaRecord,
  InMemoryGroupVerifier,
  POST_OP_MODES,
  PostOpMode,
  SponsorAccessError,
  SponsorConfigError,
  SponsorPaymaster,
  SponsorValidationError,
  parseUint256,
} from '@gas-sponsor/core';
import type { ServerConfig } from './config';

type RequestBody = Record<string, unknown>;

function isBody(value: unknown): value is RequestBody {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function requireBody(req: Request): RequestBody {
  const body: unknown = req.body;
  if (!isBody(body)) {
    throw new SponsorValidationError('request body must be a JSON object', 'body');
  }
  return body;
}

function requireString(body: RequestBody, field: string): string {
  const value = body[field];
  if (typeof value !== 'string' || value.length === 0) {
    throw new SponsorValidationError(`${field} is required and must be a string`, field);
  }
  return value;
}

function requireInteger(body: RequestBody, field: string): bigint {
  return parseUint256(requireString(body, field), field);
}

function requireMode(body: RequestBody): PostOpMode {
  const value = body.mode;
  const mode = POST_OP_MODES.find((candidate) => candidate === value);
  if (mode === undefined) {
    throw new SponsorValidationError(`mode must be one of ${POST_OP_MODES.join(', ')}`, 'mode');
  }
  return mode;
}

function serializeGasRecord(record: GasQuotaRecord): Record<string, string> {
  return {
    groupId: record.groupId.toString(),
    gasUsed: record.gasUsed.toString(),
    reserved: record.reserved.toString(),
    lastMerkleRoot: record.lastMerkleRoot.toString(),
    epoch: record.epoch.toString(),
  };
}

type AsyncHandler = (req: Request, res: Response) => Promise<void>;

/** Forward rejections of an async route to the error middleware. */
function route(handler: AsyncHandler) {
  return (req: Request, res: Response, next: NextFunction): void => {
    handler(req, res).catch(next);
  };
}

/**
 * Build the HTTP surface around a paymaster.
 *
 * @param groups - In-memory verifier to expose group management for; omit
 *   when groups live elsewhere
 */
export function createApp(
  paymaster: SponsorPaymaster,
  config: ServerConfig,
  groups?: InMemoryGroupVerifier,
): Express {
  const app = express();

  const limiter = rateLimit({
    windowMs: config.rateLimitWindowMs,
    limit: config.rateLimitMax,
    standardHeaders: true,
    legacyHeaders: false,
  });

  app.use(helmet());
  app.use(
    cors({
      origin: config.corsOrigin,
      credentials: true,
    }),
  );
  app.use(express.json());
  app.use(limiter);

  function requireApiKey(req: Request, res: Response, next: NextFunction): void {
    const apiKey = req.headers['x-api-key'];

    if (!apiKey || apiKey !== config.apiKey) {
      res.status(401).json({
        error: 'Unauthorized',
        message: 'Valid API key required',
      });
      return;
    }

    next();
  }

  function requestLogger(req: Request, _res: Response, next: NextFunction): void {
    const timestamp = new Date().toISOString();
    console.log(`[${timestamp}] ${req.method} ${req.path}`);
    next();
  }

  app.use(requestLogger);

  app.get('/health', (_req: Request, res: Response) => {
    res.json({
      status: 'healthy',
      timestamp: new Date().toISOString(),
      variant: paymaster.variant,
    });
  });

  // -------------------------------------------------------------------------
  // Two-phase protocol
  // -------------------------------------------------------------------------

  app.post(
    '/validate',
    route(async (req, res) => {
      const body = requireBody(req);
      const userOp = body.userOp;
      if (!isBody(userOp)) {
        throw new SponsorValidationError('userOp is required and must be an object', 'userOp');
      }
      const result = await paymaster.validatePaymasterUserOp(
        {
          sender: requireString(userOp, 'sender'),
          nonce: requireInteger(userOp, 'nonce'),
          paymasterData: requireString(userOp, 'paymasterData'),
        },
        requireInteger(body, 'maxCost'),
      );
      res.json(result);
    }),
  );

  app.post(
    '/post-op',
    requireApiKey,
    route(async (req, res) => {
      const body = requireBody(req);
      const receipt = await paymaster.postOp(
        requireMode(body),
        requireString(body, 'context'),
        requireInteger(body, 'actualGasCost'),
      );
      res.json({
        success: true,
        groupId: receipt.groupId.toString(),
        charged: receipt.charged.toString(),
        balance: receipt.balance.toString(),
        underflow: receipt.underflow,
        nullifier: receipt.nullifier?.toString(),
        gasUsed: receipt.gasUsed?.toString(),
      });
    }),
  );

  // -------------------------------------------------------------------------
  // Administration
  // -------------------------------------------------------------------------

  app.post(
    '/groups/:groupId/deposit',
    requireApiKey,
    route(async (req, res) => {
      const groupId = parseUint256(req.params.groupId, 'groupId');
      const balance = await paymaster.depositForGroup(groupId, requireInteger(requireBody(req), 'amount'));
      console.log(`Deposited to group ${groupId}`);
      res.json({ success: true, groupId: groupId.toString(), balance: balance.toString() });
    }),
  );

  app.put(
    '/groups/:groupId/quota',
    requireApiKey,
    route(async (req, res) => {
      const groupId = parseUint256(req.params.groupId, 'groupId');
      const body = requireBody(req);
      const amount = requireInteger(body, 'amount');
      await paymaster.setMaxGasPerUserPerEpoch(requireString(body, 'caller'), groupId, amount);
      res.json({ success: true, groupId: groupId.toString(), maxGasPerEpoch: amount.toString() });
    }),
  );

  app.post(
    '/epoch/advance',
    route(async (_req, res) => {
      const epoch = await paymaster.advanceEpoch();
      res.json({ epoch: epoch.toString() });
    }),
  );

  if (groups) {
    app.post(
      '/groups',
      requireApiKey,
      route(async (req, res) => {
        const groupId = await groups.createGroup(requireString(requireBody(req), 'admin'));
        console.log(`Created group ${groupId}`);
        res.status(201).json({ success: true, groupId: groupId.toString() });
      }),
    );

    app.post(
      '/groups/:groupId/members',
      requireApiKey,
      route(async (req, res) => {
        const groupId = parseUint256(req.params.groupId, 'groupId');
        const body = requireBody(req);
        const commitments = body.commitments;
        if (!Array.isArray(commitments) || commitments.length === 0) {
          throw new SponsorValidationError('commitments must be a non-empty array', 'commitments');
        }
        const parsed = commitments.map((value: unknown, i) => {
          if (typeof value !== 'string') {
            throw new SponsorValidationError(`commitments[${i}] must be a string`, 'commitments');
          }
          return parseUint256(value, `commitments[${i}]`);
        });
        await groups.addMembers(requireString(body, 'caller'), groupId, parsed);
        const root = await groups.getMerkleTreeRoot(groupId);
        res.json({ success: true, groupId: groupId.toString(), merkleTreeRoot: root.toString() });
      }),
    );
  }

  // -------------------------------------------------------------------------
  // Reads
  // -------------------------------------------------------------------------

  app.get(
    '/groups/:groupId/deposit',
    route(async (req, res) => {
      const groupId = parseUint256(req.params.groupId, 'groupId');
      const balance = await paymaster.groupDeposits(groupId);
      res.json({ groupId: groupId.toString(), balance: balance.toString() });
    }),
  );

  app.get(
    '/gas/:nullifier',
    route(async (req, res) => {
      const nullifier = parseUint256(req.params.nullifier, 'nullifier');
      const record = await paymaster.gasData(nullifier);
      if (record === null) {
        res.status(404).json({ error: 'Not found', message: 'No gas record for nullifier' });
        return;
      }
      res.json({ nullifier: nullifier.toString(), ...serializeGasRecord(record) });
    }),
  );

  app.get(
    '/epoch',
    route(async (_req, res) => {
      const epoch = await paymaster.currentEpoch();
      res.json({ epoch: epoch.toString() });
    }),
  );

  app.get(
    '/escrow',
    route(async (_req, res) => {
      const deposit = await paymaster.getDeposit();
      res.json({ deposit: deposit.toString() });
    }),
  );

  // Error handling middleware
  app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof SponsorValidationError) {
      res.status(400).json({ error: 'Invalid request', code: err.code, message: err.message });
      return;
    }
    if (err instanceof SponsorAccessError) {
      res.status(403).json({ error: 'Forbidden', code: err.code, message: err.message });
      return;
    }
    if (err instanceof SponsorConfigError) {
      res.status(501).json({ error: 'Not implemented', code: err.code, message: err.message });
      return;
    }
    console.error('Unhandled error:', err);
    res.status(500).json({
      error: 'Internal server error',
      message: process.env.NODE_ENV === 'production' ? 'An error occurred' : err.message,
    });
  });

  return app;
}
