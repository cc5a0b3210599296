/**
 * CollateralConfig: immutable parameters of one collateral engine
 */

import { ZeroAddress, isAddress } from 'ethers';

import type { OracleFeed } from '../types/index.js';
import { FIX_ONE } from '../utils/fixed.js';

import { ConfigInvalidError } from './errors.js';

/** Longest grace period an asset may spend IFFY (two weeks) */
export const MAX_DELAY_UNTIL_DEFAULT_SEC = 1_209_600;

export interface FeedConfig {
  feed: OracleFeed;
  /** Max age (seconds) of a reading before it is considered stale */
  timeoutSec: number;
}

/**
 * Which feeds are combined into a price
 * - fiat: reference/UoA feed, peg read from the same feed
 * - selfReferential: target/UoA feed where target == reference, peg is structurally 1
 * - nonFiat: target-per-reference feed chained with a UoA-per-target feed
 */
export type PricingMode =
  | { kind: 'fiat'; refUnitFeed: FeedConfig }
  | { kind: 'selfReferential'; targetUnitFeed: FeedConfig }
  | { kind: 'nonFiat'; targetPerRefFeed: FeedConfig; uoaPerTargetFeed: FeedConfig };

export type PricingModeKind = PricingMode['kind'];

export type FeedRole = 'refUnit' | 'targetUnit' | 'targetPerRef' | 'uoaPerTarget';

export interface FeedEntry {
  role: FeedRole;
  config: FeedConfig;
}

export interface CollateralConfig {
  erc20: string;
  targetName: string;
  pricing: PricingMode;
  oracleError: bigint;
  maxTradeVolume: bigint;
  defaultThreshold: bigint;
  delayUntilDefaultSec: number;
  priceTimeoutSec: number;
  /** Expected target-per-reference peg, 1.0 when omitted */
  targetPerRef?: bigint;
}

export interface ResolvedCollateralConfig extends Readonly<Omit<CollateralConfig, 'targetPerRef'>> {
  readonly targetPerRef: bigint;
  readonly revenueHiding: bigint;
  readonly feeds: readonly FeedEntry[];
  /** Longest per-feed timeout, used for lot price decay */
  readonly maxOracleTimeoutSec: number;
}

/**
 * Feeds of a pricing mode in evaluation order
 */
export function feedEntries(mode: PricingMode): FeedEntry[] {
  switch (mode.kind) {
    case 'fiat':
      return [{ role: 'refUnit', config: mode.refUnitFeed }];
    case 'selfReferential':
      return [{ role: 'targetUnit', config: mode.targetUnitFeed }];
    case 'nonFiat':
      return [
        { role: 'targetPerRef', config: mode.targetPerRefFeed },
        { role: 'uoaPerTarget', config: mode.uoaPerTargetFeed }
      ];
  }
}

function requireAddress(field: string, value: string | undefined): void {
  if (!value || !isAddress(value)) {
    throw new ConfigInvalidError(field, `not an address: ${String(value)}`);
  }
  if (value.toLowerCase() === ZeroAddress) {
    throw new ConfigInvalidError(field, 'zero address');
  }
}

function requirePositiveSeconds(field: string, value: number): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigInvalidError(field, `must be a positive integer number of seconds, got ${value}`);
  }
}

function requireFraction(field: string, value: bigint, allowZero: boolean): void {
  if (value < 0n || (!allowZero && value === 0n) || value >= FIX_ONE) {
    const range = allowZero ? '[0, 1)' : '(0, 1)';
    throw new ConfigInvalidError(field, `must be within ${range}, got ${value}`);
  }
}

/**
 * Validate a config and the revenue hiding fraction; throws ConfigInvalidError
 */
export function resolveCollateralConfig(
  config: CollateralConfig,
  revenueHiding: bigint
): ResolvedCollateralConfig {
  requireAddress('erc20', config.erc20);

  if (!config.targetName || config.targetName.trim() === '') {
    throw new ConfigInvalidError('targetName', 'missing');
  }

  const feeds = feedEntries(config.pricing);
  for (const entry of feeds) {
    requireAddress(`${entry.role}Feed`, entry.config.feed.address);
    requirePositiveSeconds(`${entry.role}Feed.timeoutSec`, entry.config.timeoutSec);
  }

  requirePositiveSeconds('priceTimeoutSec', config.priceTimeoutSec);

  const maxOracleTimeoutSec = Math.max(...feeds.map(f => f.config.timeoutSec));
  if (config.priceTimeoutSec < maxOracleTimeoutSec) {
    throw new ConfigInvalidError(
      'priceTimeoutSec',
      `must be at least the longest feed timeout (${maxOracleTimeoutSec}s), got ${config.priceTimeoutSec}`
    );
  }

  if (
    !Number.isInteger(config.delayUntilDefaultSec) ||
    config.delayUntilDefaultSec < 0 ||
    config.delayUntilDefaultSec > MAX_DELAY_UNTIL_DEFAULT_SEC
  ) {
    throw new ConfigInvalidError(
      'delayUntilDefaultSec',
      `must be within [0, ${MAX_DELAY_UNTIL_DEFAULT_SEC}], got ${config.delayUntilDefaultSec}`
    );
  }

  requireFraction('oracleError', config.oracleError, false);
  requireFraction('defaultThreshold', config.defaultThreshold, false);
  requireFraction('revenueHiding', revenueHiding, true);

  if (config.maxTradeVolume <= 0n) {
    throw new ConfigInvalidError('maxTradeVolume', 'must be positive');
  }

  const targetPerRef = config.targetPerRef ?? FIX_ONE;
  if (targetPerRef <= 0n) {
    throw new ConfigInvalidError('targetPerRef', 'must be positive');
  }

  return Object.freeze({
    erc20: config.erc20,
    targetName: config.targetName,
    pricing: config.pricing,
    oracleError: config.oracleError,
    maxTradeVolume: config.maxTradeVolume,
    defaultThreshold: config.defaultThreshold,
    delayUntilDefaultSec: config.delayUntilDefaultSec,
    priceTimeoutSec: config.priceTimeoutSec,
    targetPerRef,
    revenueHiding,
    feeds: Object.freeze(feeds),
    maxOracleTimeoutSec
  });
}
