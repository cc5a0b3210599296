/**
 * Build collateral engines from validated definitions
 *
 * Chain-backed collaborators are created through a factory set so the same
 * wiring can run against in-process stand-ins.
 */

import type { ContractRunner } from 'ethers';

import { CollateralEngine } from '../collateral/CollateralEngine.js';
import type { FeedConfig, PricingMode } from '../collateral/CollateralConfig.js';
import type {
  CollateralDefinition,
  FeedDefinition,
  RateDefinition,
  RewardsDefinition
} from '../config/collateralSchema.js';
import { ChainlinkFeed } from '../oracles/ChainlinkFeed.js';
import { ContractRateSource } from '../oracles/ContractRateSource.js';
import { ContractRewardSource } from '../oracles/ContractRewardSource.js';
import type {
  Clock,
  EngineLogger,
  ExchangeRateSource,
  OracleFeed,
  RewardSource
} from '../types/index.js';

import { CollateralRegistry } from './CollateralRegistry.js';

export interface CollaboratorFactories {
  feed(address: string): OracleFeed;
  rateSource(definition: RateDefinition): ExchangeRateSource;
  /** Omitted when rewards cannot be claimed (e.g. no signer) */
  rewardSource?(definition: RewardsDefinition): RewardSource;
}

export function chainFactories(runner: ContractRunner, holder?: string): CollaboratorFactories {
  const feeds = new Map<string, OracleFeed>();
  const factories: CollaboratorFactories = {
    // Feeds are shared between collaterals priced off the same aggregator
    feed(address) {
      const key = address.toLowerCase();
      let feed = feeds.get(key);
      if (!feed) {
        feed = ChainlinkFeed.connect(address, runner);
        feeds.set(key, feed);
      }
      return feed;
    },
    rateSource(definition) {
      return ContractRateSource.connect(definition, runner);
    }
  };

  if (holder) {
    factories.rewardSource = definition =>
      ContractRewardSource.connect({ ...definition, holder }, runner);
  }
  return factories;
}

function feedConfig(definition: FeedDefinition, factories: CollaboratorFactories): FeedConfig {
  return { feed: factories.feed(definition.address), timeoutSec: definition.timeoutSec };
}

function pricingMode(definition: CollateralDefinition, factories: CollaboratorFactories): PricingMode {
  const pricing = definition.pricing;
  switch (pricing.kind) {
    case 'fiat':
      return { kind: 'fiat', refUnitFeed: feedConfig(pricing.refUnitFeed, factories) };
    case 'selfReferential':
      return { kind: 'selfReferential', targetUnitFeed: feedConfig(pricing.targetUnitFeed, factories) };
    case 'nonFiat':
      return {
        kind: 'nonFiat',
        targetPerRefFeed: feedConfig(pricing.targetPerRefFeed, factories),
        uoaPerTargetFeed: feedConfig(pricing.uoaPerTargetFeed, factories)
      };
  }
}

export function buildEngine(
  definition: CollateralDefinition,
  factories: CollaboratorFactories,
  options: { clock?: Clock; logger?: EngineLogger } = {}
): CollateralEngine {
  const rewardSource =
    definition.rewards && factories.rewardSource
      ? factories.rewardSource(definition.rewards)
      : undefined;

  return new CollateralEngine(
    {
      erc20: definition.erc20,
      targetName: definition.targetName,
      pricing: pricingMode(definition, factories),
      oracleError: definition.oracleError,
      maxTradeVolume: definition.maxTradeVolume,
      defaultThreshold: definition.defaultThreshold,
      delayUntilDefaultSec: definition.delayUntilDefaultSec,
      priceTimeoutSec: definition.priceTimeoutSec,
      targetPerRef: definition.targetPerRef
    },
    definition.revenueHiding,
    {
      rateSource: factories.rateSource(definition.rate),
      rewardSource,
      clock: options.clock,
      logger: options.logger
    }
  );
}

/**
 * Build and register every definition; an invalid definition aborts the whole build
 */
export function buildRegistry(
  definitions: readonly CollateralDefinition[],
  factories: CollaboratorFactories,
  options: { clock?: Clock; logger?: EngineLogger } = {}
): CollateralRegistry {
  const registry = new CollateralRegistry(options.logger);
  for (const definition of definitions) {
    registry.register(buildEngine(definition, factories, options));
  }
  return registry;
}
