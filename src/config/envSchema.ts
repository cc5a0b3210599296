import dotenv from 'dotenv';
import { z } from 'zod';

import { parseBoolEnv, parseIntEnv } from './parseEnv.js';

dotenv.config();

const isTest = (process.env.NODE_ENV || '').toLowerCase() === 'test';

// Inject test defaults BEFORE schema parsing so Zod doesn't throw for test runs.
if (isTest) {
  if (!process.env.API_KEY) process.env.API_KEY = 'test-api-key';
  if (!process.env.JWT_SECRET) process.env.JWT_SECRET = 'test-jwt-secret';
}

export const rawEnvSchema = z.object({
  PORT: z.string().optional(),
  NODE_ENV: z.string().optional(),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']).optional(),

  API_KEY: z.string().min(3, 'API_KEY required'),
  JWT_SECRET: z.string().min(8, 'JWT_SECRET too short'),

  // Chain access
  RPC_URL: z.string().url().optional(),
  CLAIMER_PRIVATE_KEY: z.string().optional(),

  // Collateral definitions and refresh cadence
  COLLATERALS_FILE: z.string().optional(),
  REFRESH_INTERVAL_MS: z.string().optional(),
  CLAIM_REWARDS_ON_START: z.string().optional(),

  // HTTP API
  RATE_LIMIT_WINDOW_MS: z.string().optional(),
  RATE_LIMIT_MAX_REQUESTS: z.string().optional()
});

export type RawEnv = z.infer<typeof rawEnvSchema>;

export function buildEnv(source: NodeJS.ProcessEnv) {
  const parsed = rawEnvSchema.parse(source);

  return {
    port: parseIntEnv(parsed.PORT, 3000, 1, 65535),
    nodeEnv: parsed.NODE_ENV || 'development',
    logLevel: parsed.LOG_LEVEL || 'info',
    apiKey: parsed.API_KEY,
    jwtSecret: parsed.JWT_SECRET,

    rpcUrl: parsed.RPC_URL,
    claimerPrivateKey: parsed.CLAIMER_PRIVATE_KEY,

    collateralsFile: parsed.COLLATERALS_FILE || 'config/collaterals.json',
    refreshIntervalMs: parseIntEnv(parsed.REFRESH_INTERVAL_MS, 60_000, 1_000),
    claimRewardsOnStart: parseBoolEnv(parsed.CLAIM_REWARDS_ON_START, false),

    rateLimitWindowMs: parseIntEnv(parsed.RATE_LIMIT_WINDOW_MS, 60_000, 1_000),
    rateLimitMaxRequests: parseIntEnv(parsed.RATE_LIMIT_MAX_REQUESTS, 120, 1)
  };
}

export type Env = ReturnType<typeof buildEnv>;

export const env: Env = buildEnv(process.env);
