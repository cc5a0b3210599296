/**
 * Pricer: turns cached feed readings and the exposed rate into a bounded price
 *
 * Never re-reads a feed. Given the same readings and the same `now` it always
 * returns the same result.
 */

import type { FeedRound } from '../types/index.js';
import { FIX_ONE, fixMul, fixPowUp } from '../utils/fixed.js';

import type { FeedEntry, ResolvedCollateralConfig } from './CollateralConfig.js';
import { FeedStaleError } from './errors.js';

export type FeedReading =
  | { ok: true; round: FeedRound }
  | { ok: false; error: unknown };

export interface PricingInput {
  /** One reading per configured feed, in `config.feeds` order */
  feeds: readonly FeedReading[];
  /** null when the exchange rate could not be read */
  exposedRate: bigint | null;
  now: number;
  /** Time of the last successful price (or construction) */
  lastPricedAt: number;
}

export type UnpriceableReason =
  | 'not-refreshed'
  | 'rate-unreadable'
  | 'feed-unreadable'
  | 'feed-invalid'
  | 'feed-stale'
  | 'defaulted';

export interface PricedResult {
  ok: true;
  low: bigint;
  mid: bigint;
  high: bigint;
  pegPrice: bigint;
}

export interface UnpriceableResult {
  ok: false;
  reason: UnpriceableReason;
  /** How long the price has been unknown, per the oldest input */
  stalenessSec: number;
  detail: string;
  cause?: unknown;
}

export type PriceResult = PricedResult | UnpriceableResult;

export class Pricer {
  private readonly feeds: readonly FeedEntry[];
  private readonly combinedError: bigint;

  constructor(private readonly config: ResolvedCollateralConfig) {
    this.feeds = config.feeds;
    // Errors of chained conversions compose multiplicatively: (1 + e)^n - 1
    this.combinedError = fixPowUp(FIX_ONE + config.oracleError, this.feeds.length) - FIX_ONE;
  }

  /** Relative half-width of the price band */
  getCombinedError(): bigint {
    return this.combinedError;
  }

  evaluate(input: PricingInput): PriceResult {
    const { feeds, exposedRate, now, lastPricedAt } = input;

    if (feeds.length !== this.feeds.length) {
      throw new Error(`Expected ${this.feeds.length} feed readings, got ${feeds.length}`);
    }

    let oldestAge = 0;
    let unreadable: { entry: FeedEntry; error: unknown } | null = null;
    let invalid: { entry: FeedEntry; answer: bigint } | null = null;
    let stale: FeedStaleError | null = null;
    const answers: bigint[] = [];

    // Classify every reading before picking a reason
    for (let i = 0; i < feeds.length; i++) {
      const reading = feeds[i];
      const entry = this.feeds[i];
      if (!reading.ok) {
        unreadable ??= { entry, error: reading.error };
        continue;
      }
      const age = Math.max(0, now - reading.round.updatedAt);
      oldestAge = Math.max(oldestAge, age);
      if (reading.round.answer <= 0n) {
        invalid ??= { entry, answer: reading.round.answer };
      } else if (age > entry.config.timeoutSec) {
        stale ??= new FeedStaleError(entry.config.feed.address, age, entry.config.timeoutSec);
      }
      answers.push(reading.round.answer);
    }

    // An input that cannot be read or trusted leaves the price unknown since the last good one
    const degraded = exposedRate === null || unreadable !== null || invalid !== null;
    const stalenessSec = degraded ? Math.max(oldestAge, Math.max(0, now - lastPricedAt)) : oldestAge;

    if (exposedRate === null) {
      return this.unpriceable('rate-unreadable', stalenessSec, 'exchange rate unreadable');
    }
    if (unreadable) {
      return this.unpriceable(
        'feed-unreadable',
        stalenessSec,
        `${unreadable.entry.role} feed ${unreadable.entry.config.feed.address} unreadable`,
        unreadable.error
      );
    }
    if (invalid) {
      return this.unpriceable(
        'feed-invalid',
        stalenessSec,
        `${invalid.entry.role} feed ${invalid.entry.config.feed.address} answered ${invalid.answer}`
      );
    }
    if (stale) {
      return this.unpriceable('feed-stale', stalenessSec, stale.message, stale);
    }

    const { mid, pegPrice } = this.combine(answers, exposedRate);
    const err = fixMul(mid, this.combinedError, 'ceil');

    return {
      ok: true,
      low: mid > err ? mid - err : 0n,
      mid,
      high: mid + err,
      pegPrice
    };
  }

  private combine(answers: readonly bigint[], exposedRate: bigint): { mid: bigint; pegPrice: bigint } {
    const mode = this.config.pricing;
    switch (mode.kind) {
      case 'fiat': {
        // reference/UoA with UoA == target, so the same reading is the peg
        const [refPrice] = answers;
        return { mid: fixMul(refPrice, exposedRate), pegPrice: refPrice };
      }
      case 'selfReferential': {
        const [targetPrice] = answers;
        return { mid: fixMul(targetPrice, exposedRate), pegPrice: FIX_ONE };
      }
      case 'nonFiat': {
        const [targetPerRef, uoaPerTarget] = answers;
        return {
          mid: fixMul(fixMul(targetPerRef, uoaPerTarget), exposedRate),
          pegPrice: targetPerRef
        };
      }
    }
  }

  private unpriceable(
    reason: UnpriceableReason,
    stalenessSec: number,
    detail: string,
    cause?: unknown
  ): UnpriceableResult {
    return cause === undefined
      ? { ok: false, reason, stalenessSec, detail }
      : { ok: false, reason, stalenessSec, detail, cause };
  }
}
