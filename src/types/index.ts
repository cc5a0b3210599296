// Shared types for the collateral engine and its collaborators

export type CollateralStatus = 'SOUND' | 'IFFY' | 'DEFAULT';

/**
 * One oracle observation, already normalised to 18 decimals
 */
export interface FeedRound {
  answer: bigint;
  /** Unix seconds of the last oracle update */
  updatedAt: number;
}

/**
 * Price feed collaborator (e.g. a Chainlink aggregator)
 */
export interface OracleFeed {
  readonly address: string;
  latestRound(): Promise<FeedRound>;
}

/**
 * Source of the true exchange rate of a wrapped token (reference units per token, 18 decimals)
 */
export interface ExchangeRateSource {
  readonly address: string;
  refPerTok(): Promise<bigint>;
}

/**
 * Capability to claim a wrapped token's separate reward stream
 */
export interface RewardSource {
  readonly rewardToken: string;
  /** Claims to the holder and returns the amount received */
  claim(): Promise<bigint>;
}

export interface Clock {
  /** Unix seconds */
  now(): number;
}

export const systemClock: Clock = {
  now: () => Math.floor(Date.now() / 1000)
};

/**
 * Minimal logger surface accepted by engine components (winston's Logger satisfies it)
 */
export interface EngineLogger {
  info(message: string, meta?: Record<string, unknown>): unknown;
  warn(message: string, meta?: Record<string, unknown>): unknown;
  error(message: string, meta?: Record<string, unknown>): unknown;
  debug(message: string, meta?: Record<string, unknown>): unknown;
}

export interface PriceRange {
  low: bigint;
  high: bigint;
}
