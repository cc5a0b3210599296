import { env } from './envSchema.js';

export const config = {
  get port() { return env.port; },
  get nodeEnv() { return env.nodeEnv; },
  get logLevel() { return env.logLevel; },

  get apiKey() { return env.apiKey; },
  get jwtSecret() { return env.jwtSecret; },

  get rpcUrl() { return env.rpcUrl; },
  get claimerPrivateKey() { return env.claimerPrivateKey; },

  get collateralsFile() { return env.collateralsFile; },
  get refreshIntervalMs() { return env.refreshIntervalMs; },
  get claimRewardsOnStart() { return env.claimRewardsOnStart; },

  get rateLimitWindowMs() { return env.rateLimitWindowMs; },
  get rateLimitMaxRequests() { return env.rateLimitMaxRequests; }
};
