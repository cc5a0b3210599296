import { Counter, Gauge, Histogram } from 'prom-client';

import type { CollateralStatus } from '../types/index.js';

import { metricsRegistry } from './registry.js';

// Re-export the central registry
export { metricsRegistry as registry };

export const STATUS_CODES: Record<CollateralStatus, number> = {
  SOUND: 0,
  IFFY: 1,
  DEFAULT: 2
};

export const collateralStatusGauge = new Gauge({
  name: 'collateral_engine_status',
  help: 'Collateral soundness (0=SOUND, 1=IFFY, 2=DEFAULT)',
  labelNames: ['erc20', 'target'],
  registers: [metricsRegistry]
});

export const collateralRefPerTokGauge = new Gauge({
  name: 'collateral_engine_ref_per_tok',
  help: 'Exposed (revenue-hidden) reference units per token',
  labelNames: ['erc20'],
  registers: [metricsRegistry]
});

export const collateralStatusTransitionsTotal = new Counter({
  name: 'collateral_engine_status_transitions_total',
  help: 'Soundness state transitions',
  labelNames: ['erc20', 'from', 'to'],
  registers: [metricsRegistry]
});

export const collateralUnpriceableTotal = new Counter({
  name: 'collateral_engine_unpriceable_total',
  help: 'Refreshes that left the asset without a price, by reason',
  labelNames: ['erc20', 'reason'],
  registers: [metricsRegistry]
});

export const collateralRefreshFailuresTotal = new Counter({
  name: 'collateral_engine_refresh_failures_total',
  help: 'Refresh calls that threw inside a registry sweep',
  labelNames: ['erc20'],
  registers: [metricsRegistry]
});

export const collateralRefreshDuration = new Histogram({
  name: 'collateral_engine_refresh_duration_seconds',
  help: 'Duration of a single collateral refresh (seconds)',
  labelNames: ['erc20'],
  buckets: [0.01, 0.05, 0.1, 0.25, 0.5, 1, 2, 5],
  registers: [metricsRegistry]
});

export const collateralRewardsClaimedTotal = new Counter({
  name: 'collateral_engine_reward_claims_total',
  help: 'claimRewards invocations',
  labelNames: ['erc20'],
  registers: [metricsRegistry]
});
