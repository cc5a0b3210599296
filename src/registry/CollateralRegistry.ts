/**
 * CollateralRegistry: read facade over every registered collateral engine
 *
 * Portfolio views are built per asset with a fallible valuation followed by a
 * filtering pass, so an unpriceable or defaulted asset is reported as skipped
 * instead of breaking the whole traversal.
 */

import type { CollateralEngine } from '../collateral/CollateralEngine.js';
import type { PricingModeKind } from '../collateral/CollateralConfig.js';
import type { Transition } from '../collateral/DefaultMonitor.js';
import { formatError } from '../collateral/errors.js';
import type { UnpriceableReason } from '../collateral/Pricer.js';
import { collateralRefreshFailuresTotal } from '../metrics/index.js';
import type { CollateralStatus, EngineLogger, PriceRange } from '../types/index.js';
import { WAD, fixDiv, fixMul, mulDiv } from '../utils/fixed.js';
import { logger as defaultLogger } from '../utils/logger.js';

export interface CollateralSnapshot {
  erc20: string;
  targetName: string;
  pricingMode: PricingModeKind;
  status: CollateralStatus;
  refPerTok: bigint;
  price: PriceRange | null;
  unpricedReason: UnpriceableReason | null;
  /** null while SOUND */
  whenDefault: number | null;
  lastRefreshedAt: number | null;
}

export interface RefreshReport {
  refreshed: string[];
  failed: Array<{ erc20: string; error: string }>;
  transitions: Array<{ erc20: string } & Transition>;
}

export type SkipReason = UnpriceableReason | 'zero-low' | 'unregistered' | 'negative-balance';

export interface AssetValue {
  erc20: string;
  balance: bigint;
  low: bigint;
  high: bigint;
}

export interface SkippedAsset {
  erc20: string;
  reason: SkipReason;
}

export interface BackingValue {
  low: bigint;
  high: bigint;
  assets: AssetValue[];
  skipped: SkippedAsset[];
}

export interface BasketShare {
  erc20: string;
  /** Fraction of total mid value, 18 decimals */
  share: bigint;
}

/** Token balances keyed by token address, 18-decimal whole-token units */
export type Balances = ReadonlyMap<string, bigint>;

type Valuation = { ok: true; value: AssetValue } | { ok: false; skipped: SkippedAsset };

function normalize(address: string): string {
  return address.toLowerCase();
}

export class CollateralRegistry {
  private readonly engines = new Map<string, CollateralEngine>();

  constructor(private readonly log: EngineLogger = defaultLogger) {}

  register(engine: CollateralEngine): void {
    const key = normalize(engine.erc20());
    if (this.engines.has(key)) {
      throw new Error(`Collateral already registered: ${engine.erc20()}`);
    }
    this.engines.set(key, engine);
    this.log.info(
      `[registry] registered erc20=${engine.erc20()} target=${engine.targetName()} mode=${engine.pricingMode()}`
    );
  }

  get(erc20: string): CollateralEngine | undefined {
    return this.engines.get(normalize(erc20));
  }

  list(): CollateralEngine[] {
    return [...this.engines.values()];
  }

  size(): number {
    return this.engines.size;
  }

  /**
   * Refresh every engine; a failing engine never blocks the others
   */
  async refreshAll(): Promise<RefreshReport> {
    const engines = this.list();
    const results = await Promise.allSettled(engines.map(engine => engine.refresh()));

    const report: RefreshReport = { refreshed: [], failed: [], transitions: [] };
    results.forEach((result, i) => {
      const erc20 = engines[i].erc20();
      if (result.status === 'fulfilled') {
        report.refreshed.push(erc20);
        if (result.value.transition) {
          report.transitions.push({ erc20, ...result.value.transition });
        }
      } else {
        const error = formatError(result.reason);
        collateralRefreshFailuresTotal.inc({ erc20 });
        this.log.error(`[registry] refresh_failed erc20=${erc20} error=${error}`);
        report.failed.push({ erc20, error });
      }
    });

    return report;
  }

  snapshot(): CollateralSnapshot[] {
    return this.list().map(engine => this.snapshotOf(engine));
  }

  snapshotOf(engine: CollateralEngine): CollateralSnapshot {
    const price = engine.tryPrice();
    const whenDefault = engine.whenDefault();
    return {
      erc20: engine.erc20(),
      targetName: engine.targetName(),
      pricingMode: engine.pricingMode(),
      status: engine.status(),
      refPerTok: engine.refPerTok(),
      price: price.ok ? { low: price.low, high: price.high } : null,
      unpricedReason: price.ok ? null : price.reason,
      whenDefault: Number.isFinite(whenDefault) ? whenDefault : null,
      lastRefreshedAt: engine.lastRefreshedAt()
    };
  }

  /**
   * Total value of the balances in the unit of account, skipping assets without a usable price
   */
  backingValue(balances: Balances): BackingValue {
    const valuations = [...balances.entries()].map(([erc20, balance]) => this.valueOf(erc20, balance));

    const assets: AssetValue[] = [];
    const skipped: SkippedAsset[] = [];
    for (const valuation of valuations) {
      if (valuation.ok) {
        assets.push(valuation.value);
      } else {
        skipped.push(valuation.skipped);
      }
    }

    return {
      low: assets.reduce((sum, a) => sum + a.low, 0n),
      high: assets.reduce((sum, a) => sum + a.high, 0n),
      assets,
      skipped
    };
  }

  /**
   * Each priced asset's share of the total mid value
   */
  breakdown(balances: Balances): BasketShare[] {
    const { assets } = this.backingValue(balances);
    const mids = assets.map(a => ({ erc20: a.erc20, mid: (a.low + a.high) / 2n }));
    const total = mids.reduce((sum, m) => sum + m.mid, 0n);
    if (total === 0n) {
      return [];
    }
    return mids.map(m => ({ erc20: m.erc20, share: mulDiv(m.mid, WAD, total, 'floor') }));
  }

  /**
   * Conservative backing ratio: low backing value over liabilities; null without liabilities
   */
  collateralization(balances: Balances, liabilities: bigint): bigint | null {
    if (liabilities <= 0n) {
      return null;
    }
    return fixDiv(this.backingValue(balances).low, liabilities, 'floor');
  }

  private valueOf(erc20: string, balance: bigint): Valuation {
    const engine = this.get(erc20);
    if (!engine) {
      return { ok: false, skipped: { erc20, reason: 'unregistered' } };
    }
    if (balance < 0n) {
      return { ok: false, skipped: { erc20: engine.erc20(), reason: 'negative-balance' } };
    }

    const price = engine.tryPrice();
    if (!price.ok) {
      return { ok: false, skipped: { erc20: engine.erc20(), reason: price.reason } };
    }
    if (price.low === 0n) {
      return { ok: false, skipped: { erc20: engine.erc20(), reason: 'zero-low' } };
    }

    return {
      ok: true,
      value: {
        erc20: engine.erc20(),
        balance,
        low: fixMul(balance, price.low, 'floor'),
        high: fixMul(balance, price.high, 'ceil')
      }
    };
  }
}
