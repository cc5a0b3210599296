// Unit tests for CollateralEngine
import { describe, it, expect } from 'vitest';

import type { CollateralConfig } from '../../src/collateral/CollateralConfig.js';
import {
  CollateralEngine,
  type RewardsClaimedEvent,
  type StatusChangedEvent
} from '../../src/collateral/CollateralEngine.js';
import { ConfigInvalidError, IncompleteRoundError, PriceUnavailableError } from '../../src/collateral/errors.js';
import { type AggregatorRound, type AggregatorV3, ChainlinkFeed } from '../../src/oracles/ChainlinkFeed.js';
import { fp } from '../../src/utils/fixed.js';
import {
  DeferredFeed,
  FEED_A,
  FEED_B,
  FakeFeed,
  FakeRateSource,
  FakeRewardSource,
  ManualClock,
  REWARD_TOKEN,
  TOKEN,
  fiatConfig,
  nonFiatPricing,
  silentLogger
} from '../helpers/fakes.js';

function setup(overrides: Partial<CollateralConfig> = {}, revenueHiding = 0n, rewards?: FakeRewardSource) {
  const clock = new ManualClock(0);
  const feed = new FakeFeed(FEED_A, fp('1'), 0);
  const rateSource = new FakeRateSource(fp('1'));
  const logger = silentLogger();
  const engine = new CollateralEngine(fiatConfig(feed, overrides), revenueHiding, {
    rateSource,
    rewardSource: rewards,
    clock,
    logger
  });

  const events: StatusChangedEvent[] = [];
  engine.on(CollateralEngine.STATUS_CHANGED, (event: StatusChangedEvent) => events.push(event));

  // Move the clock and keep the feed fresh at the new time
  const at = (timestamp: number, answer?: string): void => {
    clock.set(timestamp);
    feed.set(answer === undefined ? feed.answer : fp(answer), timestamp);
  };

  return { clock, feed, rateSource, logger, engine, events, at };
}

describe('CollateralEngine', () => {
  describe('before the first refresh', () => {
    it('should be SOUND with nothing to price', () => {
      const { engine } = setup();

      expect(engine.status()).toBe('SOUND');
      expect(engine.refPerTok()).toBe(0n);
      expect(engine.underlyingRefPerTok()).toBeNull();
      expect(engine.lastRefreshedAt()).toBeNull();
      expect(engine.whenDefault()).toBe(Infinity);
      expect(engine.lotPrice()).toEqual({ low: 0n, high: 0n });

      const result = engine.tryPrice();
      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.reason).toBe('not-refreshed');
    });

    it('should throw from price()', () => {
      const { engine } = setup();
      expect(() => engine.price()).toThrow(PriceUnavailableError);
      expect(() => engine.price()).toThrow(`No price available for ${TOKEN}: not-refreshed`);
    });

    it('should reject an invalid config at construction', () => {
      expect(() => setup({ oracleError: 0n })).toThrow(ConfigInvalidError);
    });

    it('should expose static config', () => {
      const { engine } = setup();
      expect(engine.erc20()).toBe(TOKEN);
      expect(engine.targetName()).toBe('USD');
      expect(engine.pricingMode()).toBe('fiat');
      expect(engine.maxTradeVolume()).toBe(fp('1000000'));
      expect(engine.targetPerRef()).toBe(fp('1'));
    });
  });

  describe('refresh', () => {
    it('should price a healthy asset', async () => {
      const { engine } = setup();

      const outcome = await engine.refresh();

      expect(outcome.status).toBe('SOUND');
      expect(outcome.transition).toBeNull();
      expect(outcome.refPerTok).toBe(fp('1'));
      expect(engine.price()).toEqual({ low: fp('0.995'), high: fp('1.005') });
      expect(engine.lastRefreshedAt()).toBe(0);
      expect(engine.pegDeviation()).toBe(0n);
    });

    it('should hide revenue in refPerTok and in the price', async () => {
      const { engine, rateSource, at } = setup({}, fp('0.1'));

      await engine.refresh();
      expect(engine.refPerTok()).toBe(fp('0.9'));

      rateSource.rate = fp('1.05');
      at(10);
      await engine.refresh();
      expect(engine.refPerTok()).toBe(fp('0.945'));

      rateSource.rate = fp('1.03');
      at(20);
      await engine.refresh();
      expect(engine.refPerTok()).toBe(fp('0.945'));
      expect(engine.peakRefPerTok()).toBe(fp('1.05'));
      expect(engine.underlyingRefPerTok()).toBe(fp('1.03'));
      expect(engine.status()).toBe('SOUND');
      expect(engine.price()).toEqual({ low: fp('0.940275'), high: fp('0.949725') });
    });

    it('should go IFFY on a 2% depeg and DEFAULT after one day', async () => {
      const { engine, events, at, logger } = setup();
      at(0, '0.98');

      const first = await engine.refresh();
      expect(first.transition).toMatchObject({ from: 'SOUND', to: 'IFFY', at: 0 });
      expect(engine.status()).toBe('IFFY');
      expect(engine.iffySince()).toBe(0);
      expect(engine.whenDefault()).toBe(86400);
      expect(engine.pegDeviation()).toBe(fp('0.02'));

      at(86400);
      await engine.refresh();
      expect(engine.status()).toBe('DEFAULT');
      expect(engine.whenDefault()).toBe(86400);

      expect(events.map(e => `${e.from}->${e.to}@${e.at}`)).toEqual(['SOUND->IFFY@0', 'IFFY->DEFAULT@86400']);
      expect(events[1]).toMatchObject({ erc20: TOKEN, code: 'PEG_BROKEN', reason: 'grace period elapsed while IFFY' });
      expect(logger.error).toHaveBeenCalledTimes(1);
    });

    it('should recover to SOUND when the peg returns within the grace period', async () => {
      const { engine, events, at } = setup();
      at(0, '0.98');
      await engine.refresh();

      at(500, '0.995');
      const outcome = await engine.refresh();

      expect(outcome.transition).toEqual({ from: 'IFFY', to: 'SOUND', at: 500, reason: null });
      expect(engine.status()).toBe('SOUND');
      expect(engine.iffySince()).toBeNull();
      expect(events).toHaveLength(2);
      expect(events[1]).toMatchObject({ from: 'IFFY', to: 'SOUND', code: null, reason: null });
    });

    it('should be idempotent at the same instant', async () => {
      const { engine, events, at } = setup();
      at(0, '0.98');

      await engine.refresh();
      const again = await engine.refresh();

      expect(again.transition).toBeNull();
      expect(engine.status()).toBe('IFFY');
      expect(engine.iffySince()).toBe(0);
      expect(events).toHaveLength(1);
    });

    it('should apply a single transition for overlapping refreshes', async () => {
      const { engine, events, at } = setup();
      at(0, '0.98');

      const outcomes = await Promise.all([engine.refresh(), engine.refresh()]);

      expect(outcomes.filter(o => o.transition !== null)).toHaveLength(1);
      expect(events).toHaveLength(1);
      expect(engine.status()).toBe('IFFY');
    });

    it('should go IFFY when the exchange rate falls below the exposed rate', async () => {
      const { engine, rateSource, events, at } = setup();
      await engine.refresh();

      rateSource.rate = fp('0.99');
      at(10);
      await engine.refresh();

      expect(engine.status()).toBe('IFFY');
      expect(engine.refPerTok()).toBe(fp('1'));
      expect(events[0].reason).toBe('exchange rate fell below the exposed rate');

      rateSource.rate = fp('1');
      at(20);
      await engine.refresh();
      expect(engine.status()).toBe('SOUND');
    });

    it('should stay SOUND but unpriceable while the rate source fails', async () => {
      const { engine, rateSource, at } = setup();
      await engine.refresh();

      rateSource.failWith = new Error('call reverted');
      at(60);
      await expect(engine.refresh()).resolves.toMatchObject({ status: 'SOUND' });

      const result = engine.tryPrice();
      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.reason).toBe('rate-unreadable');
      expect(engine.refPerTok()).toBe(fp('1'));
    });

    it('should default when a feed stays unreadable past the price timeout', async () => {
      const { engine, feed, clock, events } = setup();
      feed.failWith = new Error('rpc down');

      clock.set(100);
      await engine.refresh();
      expect(engine.status()).toBe('SOUND');
      const result = engine.tryPrice();
      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.reason).toBe('feed-unreadable');

      clock.set(604801);
      await engine.refresh();
      expect(engine.status()).toBe('DEFAULT');
      expect(events[0]).toMatchObject({ from: 'SOUND', to: 'DEFAULT', code: 'PRICE_UNKNOWN_TOO_LONG' });
    });

    it('should default on a stale feed only once total staleness exceeds the price timeout', async () => {
      const clock = new ManualClock(0);
      const targetPerRef = new FakeFeed(FEED_A, fp('1'), 0);
      const uoaPerTarget = new FakeFeed(FEED_B, fp('30000'), 0);
      const engine = new CollateralEngine(
        fiatConfig(targetPerRef, { targetName: 'BTC', pricing: nonFiatPricing(targetPerRef, uoaPerTarget) }),
        0n,
        { rateSource: new FakeRateSource(fp('1')), clock, logger: silentLogger() }
      );

      await engine.refresh();
      expect(engine.price()).toEqual({ low: fp('29699.25'), high: fp('30300.75') });

      clock.set(4000);
      uoaPerTarget.set(fp('30000'), 4000);
      await engine.refresh();
      expect(engine.status()).toBe('SOUND');
      const stale = engine.tryPrice();
      expect(stale.ok).toBe(false);
      if (stale.ok) return;
      expect(stale.reason).toBe('feed-stale');
      expect(stale.stalenessSec).toBe(4000);

      clock.set(604800);
      uoaPerTarget.set(fp('30000'), 604800);
      await engine.refresh();
      expect(engine.status()).toBe('SOUND');

      clock.set(604801);
      uoaPerTarget.set(fp('30000'), 604801);
      await engine.refresh();
      expect(engine.status()).toBe('DEFAULT');
    });
  });

  describe('with a Chainlink feed', () => {
    const T = 1_700_000_000;

    it('should ride out an incomplete round without defaulting', async () => {
      let round: AggregatorRound = { roundId: 10n, answer: 100000000n, updatedAt: BigInt(T), answeredInRound: 10n };
      const aggregator: AggregatorV3 = {
        decimals: async () => 8,
        latestRoundData: async () => round
      };
      const feed = new ChainlinkFeed(FEED_A, aggregator);
      const clock = new ManualClock(T);
      const engine = new CollateralEngine(fiatConfig(feed), 0n, {
        rateSource: new FakeRateSource(fp('1')),
        clock,
        logger: silentLogger()
      });
      const events: StatusChangedEvent[] = [];
      engine.on(CollateralEngine.STATUS_CHANGED, (event: StatusChangedEvent) => events.push(event));

      await engine.refresh();
      expect(engine.price()).toEqual({ low: fp('0.995'), high: fp('1.005') });

      clock.set(T + 60);
      round = { roundId: 11n, answer: 100000000n, updatedAt: BigInt(T), answeredInRound: 10n };
      await engine.refresh();
      expect(engine.status()).toBe('SOUND');
      const blip = engine.tryPrice();
      expect(blip.ok).toBe(false);
      if (blip.ok) return;
      expect(blip.reason).toBe('feed-unreadable');
      expect(blip.stalenessSec).toBe(60);
      expect(blip.cause).toBeInstanceOf(IncompleteRoundError);

      clock.set(T + 120);
      round = { roundId: 11n, answer: 100000000n, updatedAt: BigInt(T + 120), answeredInRound: 11n };
      await engine.refresh();
      expect(engine.status()).toBe('SOUND');
      expect(engine.price()).toEqual({ low: fp('0.995'), high: fp('1.005') });
      expect(events).toEqual([]);
    });
  });

  describe('out-of-order refreshes', () => {
    it('should not let an older refresh overwrite a newer one', async () => {
      const clock = new ManualClock(0);
      const feed = new DeferredFeed(FEED_A);
      const engine = new CollateralEngine(fiatConfig(feed), 0n, {
        rateSource: new FakeRateSource(fp('1')),
        clock,
        logger: silentLogger()
      });
      const events: StatusChangedEvent[] = [];
      engine.on(CollateralEngine.STATUS_CHANGED, (event: StatusChangedEvent) => events.push(event));

      const older = engine.refresh();
      const newer = engine.refresh();
      expect(feed.pendingCalls()).toBe(2);

      feed.resolveCall(1, { answer: fp('1'), updatedAt: 0 });
      await newer;
      feed.resolveCall(0, { answer: fp('0.98'), updatedAt: 0 });
      const outcome = await older;

      expect(outcome.transition).toBeNull();
      expect(engine.status()).toBe('SOUND');
      expect(engine.price()).toEqual({ low: fp('0.995'), high: fp('1.005') });
      expect(events).toEqual([]);
    });
  });

  describe('DEFAULT', () => {
    it('should be terminal and stop reading collaborators', async () => {
      const { engine, feed, rateSource, events, at } = setup({ delayUntilDefaultSec: 0 });
      at(0, '0.98');

      const first = await engine.refresh();
      expect(first.transition).toMatchObject({ from: 'SOUND', to: 'DEFAULT' });
      expect(feed.calls).toBe(1);

      at(100, '1');
      const later = await engine.refresh();
      expect(later.transition).toBeNull();
      expect(later.status).toBe('DEFAULT');
      expect(feed.calls).toBe(1);
      expect(rateSource.calls).toBe(1);
      expect(events).toHaveLength(1);
    });

    it('should refuse to price a defaulted asset', async () => {
      const { engine, at } = setup({ delayUntilDefaultSec: 0 });
      at(0, '0.98');
      await engine.refresh();

      const result = engine.tryPrice();
      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.reason).toBe('defaulted');
      expect(() => engine.price()).toThrow(`No price available for ${TOKEN}: defaulted`);
      expect(engine.pegDeviation()).toBeNull();
    });
  });

  describe('read-only queries', () => {
    it('should not read feeds or change status', async () => {
      const { engine, feed, clock } = setup();
      await engine.refresh();
      const calls = feed.calls;

      clock.set(5000);
      const first = engine.tryPrice();
      const second = engine.tryPrice();

      expect(first).toEqual(second);
      expect(first.ok).toBe(false);
      if (first.ok) return;
      expect(first.reason).toBe('feed-stale');
      expect(engine.status()).toBe('SOUND');
      expect(feed.calls).toBe(calls);
    });
  });

  describe('lotPrice', () => {
    it('should hold the saved price through the oracle timeout, then decay to zero', async () => {
      const { engine, clock } = setup();
      await engine.refresh();

      clock.set(3600);
      expect(engine.lotPrice()).toEqual({ low: fp('0.995'), high: fp('1.005') });

      clock.set(3600 + 302400);
      expect(engine.lotPrice()).toEqual({ low: fp('0.4975'), high: fp('0.5025') });

      clock.set(3600 + 604800);
      expect(engine.lotPrice()).toEqual({ low: 0n, high: 0n });
    });
  });

  describe('claimRewards', () => {
    it('should resolve with zero and still emit without a reward source', async () => {
      const { engine } = setup();
      const claimed: RewardsClaimedEvent[] = [];
      engine.on(CollateralEngine.REWARDS_CLAIMED, (event: RewardsClaimedEvent) => claimed.push(event));

      await expect(engine.claimRewards()).resolves.toBe(0n);
      expect(claimed).toEqual([{ erc20: TOKEN, rewardToken: null, amount: 0n }]);
    });

    it('should forward the claimed amount without touching status', async () => {
      const rewards = new FakeRewardSource(5n);
      const { engine } = setup({}, 0n, rewards);
      const claimed: RewardsClaimedEvent[] = [];
      engine.on(CollateralEngine.REWARDS_CLAIMED, (event: RewardsClaimedEvent) => claimed.push(event));

      await expect(engine.claimRewards()).resolves.toBe(5n);
      expect(rewards.claims).toBe(1);
      expect(claimed).toEqual([{ erc20: TOKEN, rewardToken: REWARD_TOKEN, amount: 5n }]);
      expect(engine.status()).toBe('SOUND');
    });
  });
});
