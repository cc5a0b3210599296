/**
 * CollateralEngine: valuation and default detection for one wrapped token
 *
 * refresh() is the only mutating operation. It reads the exchange rate and every
 * configured feed first, then applies all state changes synchronously so that
 * overlapping refreshes never interleave a half-applied transition. Every other
 * operation works from the readings cached by the last refresh.
 */

import EventEmitter from 'events';

import {
  type Clock,
  type CollateralStatus,
  type EngineLogger,
  type ExchangeRateSource,
  type PriceRange,
  type RewardSource,
  systemClock
} from '../types/index.js';
import { formatFixed, fixToNumber, mulDiv } from '../utils/fixed.js';
import { logger as defaultLogger } from '../utils/logger.js';
import {
  STATUS_CODES,
  collateralRefPerTokGauge,
  collateralRefreshDuration,
  collateralRewardsClaimedTotal,
  collateralStatusGauge,
  collateralStatusTransitionsTotal,
  collateralUnpriceableTotal
} from '../metrics/index.js';

import { AppreciationTracker } from './AppreciationTracker.js';
import {
  type CollateralConfig,
  type PricingModeKind,
  type ResolvedCollateralConfig,
  resolveCollateralConfig
} from './CollateralConfig.js';
import { DefaultMonitor, type MonitorSignal, type Transition } from './DefaultMonitor.js';
import { PriceUnavailableError, formatError } from './errors.js';
import { type FeedReading, type PriceResult, Pricer } from './Pricer.js';

export interface CollateralEngineDeps {
  rateSource: ExchangeRateSource;
  rewardSource?: RewardSource;
  clock?: Clock;
  logger?: EngineLogger;
}

export interface StatusChangedEvent {
  erc20: string;
  from: CollateralStatus;
  to: CollateralStatus;
  at: number;
  code: string | null;
  reason: string | null;
}

export interface RewardsClaimedEvent {
  erc20: string;
  rewardToken: string | null;
  amount: bigint;
}

export interface RefreshOutcome {
  status: CollateralStatus;
  transition: Transition | null;
  price: PriceResult;
  refPerTok: bigint;
}

interface SavedPrice extends PriceRange {
  at: number;
}

type Settled<T> = { ok: true; value: T } | { ok: false; error: unknown };

async function settle<T>(fn: () => Promise<T>): Promise<Settled<T>> {
  try {
    return { ok: true, value: await fn() };
  } catch (error) {
    return { ok: false, error };
  }
}

export class CollateralEngine extends EventEmitter {
  static readonly STATUS_CHANGED = 'statusChanged';
  static readonly REWARDS_CLAIMED = 'rewardsClaimed';

  readonly config: ResolvedCollateralConfig;

  private readonly tracker: AppreciationTracker;
  private readonly pricer: Pricer;
  private readonly monitor: DefaultMonitor;
  private readonly rateSource: ExchangeRateSource;
  private readonly rewardSource: RewardSource | null;
  private readonly clock: Clock;
  private readonly log: EngineLogger;

  // Readings cached by the last refresh
  private feedReadings: FeedReading[] | null = null;
  private cachedExposedRate: bigint | null = null;
  private lastPricedAt: number;
  private saved: SavedPrice | null = null;
  private lastRefreshAt: number | null = null;
  // Refreshes are numbered when they start; a slower, older one never overwrites a newer one
  private startedRefreshes = 0;
  private appliedRefresh = 0;

  constructor(config: CollateralConfig, revenueHiding: bigint, deps: CollateralEngineDeps) {
    super();
    this.config = resolveCollateralConfig(config, revenueHiding);
    this.tracker = new AppreciationTracker(revenueHiding);
    this.pricer = new Pricer(this.config);
    this.monitor = new DefaultMonitor({
      targetPerRef: this.config.targetPerRef,
      defaultThreshold: this.config.defaultThreshold,
      delayUntilDefaultSec: this.config.delayUntilDefaultSec,
      priceTimeoutSec: this.config.priceTimeoutSec
    });
    this.rateSource = deps.rateSource;
    this.rewardSource = deps.rewardSource ?? null;
    this.clock = deps.clock ?? systemClock;
    this.log = deps.logger ?? defaultLogger;
    this.lastPricedAt = this.clock.now();

    collateralStatusGauge.set(
      { erc20: this.config.erc20, target: this.config.targetName },
      STATUS_CODES.SOUND
    );
  }

  /**
   * Re-read collaborators, advance the appreciation tracker and the default monitor
   */
  async refresh(): Promise<RefreshOutcome> {
    if (this.monitor.status() === 'DEFAULT') {
      return this.outcome(null, this.tryPrice());
    }

    const seq = ++this.startedRefreshes;
    const endTimer = collateralRefreshDuration.startTimer({ erc20: this.config.erc20 });
    const [rate, feeds] = await Promise.all([
      settle(() => this.rateSource.refPerTok()),
      Promise.all(this.config.feeds.map(entry => settle(() => entry.config.feed.latestRound())))
    ]);
    endTimer();

    // No await below this point
    if (this.monitor.status() === 'DEFAULT') {
      return this.outcome(null, this.tryPrice());
    }
    if (seq < this.appliedRefresh) {
      this.log.debug(`[collateral] refresh_superseded erc20=${this.config.erc20} seq=${seq} applied=${this.appliedRefresh}`);
      return this.outcome(null, this.tryPrice());
    }
    this.appliedRefresh = seq;

    const now = this.clock.now();
    this.lastRefreshAt = now;

    let exposedRate: bigint | null = null;
    let promiseBroken = false;
    if (rate.ok) {
      try {
        exposedRate = this.tracker.update(rate.value);
        promiseBroken = this.tracker.isPromiseBroken(rate.value);
      } catch (err) {
        this.log.warn(`[collateral] rate_rejected erc20=${this.config.erc20} error=${formatError(err)}`);
      }
    } else {
      this.log.warn(
        `[collateral] rate_unreadable erc20=${this.config.erc20} source=${this.rateSource.address} ` +
        `error=${formatError(rate.error)}`
      );
    }

    this.cachedExposedRate = exposedRate;
    this.feedReadings = feeds.map((reading): FeedReading =>
      reading.ok ? { ok: true, round: reading.value } : { ok: false, error: reading.error }
    );

    const price = this.pricer.evaluate({
      feeds: this.feedReadings,
      exposedRate,
      now,
      lastPricedAt: this.lastPricedAt
    });

    let signal: MonitorSignal;
    if (price.ok) {
      this.lastPricedAt = now;
      this.saved = { low: price.low, high: price.high, at: now };
      signal = { priced: true, pegPrice: price.pegPrice, low: price.low, promiseBroken };
    } else {
      collateralUnpriceableTotal.inc({ erc20: this.config.erc20, reason: price.reason });
      this.log.warn(
        `[collateral] unpriceable erc20=${this.config.erc20} reason=${price.reason} ` +
        `staleness=${price.stalenessSec}s detail="${price.detail}"`
      );
      signal = { priced: false, stalenessSec: price.stalenessSec, promiseBroken };
    }

    const transition = this.monitor.evaluate(signal, now);
    if (transition) {
      this.onTransition(transition);
    }

    collateralRefPerTokGauge.set({ erc20: this.config.erc20 }, fixToNumber(this.tracker.exposedRate()));

    return this.outcome(transition, this.tryPrice());
  }

  /**
   * Current price band from cached readings; never re-reads feeds or mutates state
   */
  tryPrice(): PriceResult {
    const now = this.clock.now();

    if (this.monitor.status() === 'DEFAULT') {
      return {
        ok: false,
        reason: 'defaulted',
        stalenessSec: Math.max(0, now - this.lastPricedAt),
        detail: `collateral defaulted at ${this.monitor.defaultedAt()}`
      };
    }

    if (this.feedReadings === null) {
      return {
        ok: false,
        reason: 'not-refreshed',
        stalenessSec: Math.max(0, now - this.lastPricedAt),
        detail: 'no refresh has completed yet'
      };
    }

    return this.pricer.evaluate({
      feeds: this.feedReadings,
      exposedRate: this.cachedExposedRate,
      now,
      lastPricedAt: this.lastPricedAt
    });
  }

  /**
   * Price band in the unit of account
   * @throws PriceUnavailableError when the asset is unpriceable or defaulted
   */
  price(): PriceRange {
    const result = this.tryPrice();
    if (!result.ok) {
      throw new PriceUnavailableError(this.config.erc20, result.reason);
    }
    return { low: result.low, high: result.high };
  }

  /**
   * Last saved price, decayed linearly to zero over the price timeout once the
   * longest oracle timeout has passed
   */
  lotPrice(): PriceRange {
    if (this.saved === null) {
      return { low: 0n, high: 0n };
    }

    const delta = this.clock.now() - this.saved.at;
    const oracleTimeout = this.config.maxOracleTimeoutSec;
    const priceTimeout = this.config.priceTimeoutSec;

    if (delta <= oracleTimeout) {
      return { low: this.saved.low, high: this.saved.high };
    }
    if (delta >= oracleTimeout + priceTimeout) {
      return { low: 0n, high: 0n };
    }

    const remaining = BigInt(priceTimeout - (delta - oracleTimeout));
    const total = BigInt(priceTimeout);
    return {
      low: mulDiv(this.saved.low, remaining, total, 'floor'),
      high: mulDiv(this.saved.high, remaining, total, 'floor')
    };
  }

  status(): CollateralStatus {
    return this.monitor.status();
  }

  /** Exposed (revenue-hidden) reference units per token */
  refPerTok(): bigint {
    return this.tracker.exposedRate();
  }

  /** Last raw exchange rate observed, null before the first readable rate */
  underlyingRefPerTok(): bigint | null {
    return this.tracker.lastRawRate();
  }

  peakRefPerTok(): bigint {
    return this.tracker.peakRate();
  }

  targetPerRef(): bigint {
    return this.config.targetPerRef;
  }

  whenDefault(): number {
    return this.monitor.whenDefault();
  }

  iffySince(): number | null {
    return this.monitor.iffySince();
  }

  pegDeviation(): bigint | null {
    const result = this.tryPrice();
    return result.ok ? this.monitor.deviation(result.pegPrice) : null;
  }

  erc20(): string {
    return this.config.erc20;
  }

  targetName(): string {
    return this.config.targetName;
  }

  pricingMode(): PricingModeKind {
    return this.config.pricing.kind;
  }

  maxTradeVolume(): bigint {
    return this.config.maxTradeVolume;
  }

  lastRefreshedAt(): number | null {
    return this.lastRefreshAt;
  }

  /**
   * Forward any claimable reward balance to the holder; resolves with the amount
   */
  async claimRewards(): Promise<bigint> {
    const amount = this.rewardSource ? await this.rewardSource.claim() : 0n;
    collateralRewardsClaimedTotal.inc({ erc20: this.config.erc20 });

    const event: RewardsClaimedEvent = {
      erc20: this.config.erc20,
      rewardToken: this.rewardSource?.rewardToken ?? null,
      amount
    };
    this.log.info(
      `[collateral] rewards_claimed erc20=${event.erc20} token=${event.rewardToken ?? 'none'} amount=${amount}`
    );
    this.emit(CollateralEngine.REWARDS_CLAIMED, event);
    return amount;
  }

  private onTransition(transition: Transition): void {
    const event: StatusChangedEvent = {
      erc20: this.config.erc20,
      from: transition.from,
      to: transition.to,
      at: transition.at,
      code: transition.reason?.code ?? null,
      reason: transition.reason?.message ?? null
    };

    collateralStatusTransitionsTotal.inc({ erc20: event.erc20, from: event.from, to: event.to });
    collateralStatusGauge.set(
      { erc20: event.erc20, target: this.config.targetName },
      STATUS_CODES[event.to]
    );

    const line =
      `[collateral] status_changed erc20=${event.erc20} ${event.from}->${event.to} at=${event.at}` +
      (event.reason ? ` reason="${event.reason}"` : '') +
      ` refPerTok=${formatFixed(this.tracker.exposedRate())}`;
    if (event.to === 'DEFAULT') {
      this.log.error(line);
    } else {
      this.log.warn(line);
    }

    this.emit(CollateralEngine.STATUS_CHANGED, event);
  }

  private outcome(transition: Transition | null, price: PriceResult): RefreshOutcome {
    return {
      status: this.monitor.status(),
      transition,
      price,
      refPerTok: this.tracker.exposedRate()
    };
  }
}
