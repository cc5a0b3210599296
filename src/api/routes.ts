// API routes - read-only views over registered collateral
import { Router } from 'express';

import type { CollateralRegistry, CollateralSnapshot } from '../registry/CollateralRegistry.js';
import { formatError } from '../collateral/errors.js';
import type { CollateralStatus } from '../types/index.js';
import { formatFixed } from '../utils/fixed.js';

export interface SerializedSnapshot {
  erc20: string;
  targetName: string;
  pricingMode: string;
  status: CollateralStatus;
  refPerTok: string;
  price: { low: string; high: string } | null;
  unpricedReason: string | null;
  whenDefault: number | null;
  lastRefreshedAt: number | null;
}

export function serializeSnapshot(snapshot: CollateralSnapshot): SerializedSnapshot {
  return {
    ...snapshot,
    refPerTok: formatFixed(snapshot.refPerTok),
    price: snapshot.price
      ? { low: formatFixed(snapshot.price.low), high: formatFixed(snapshot.price.high) }
      : null
  };
}

export default function buildRoutes(registry: CollateralRegistry) {
  const router = Router();

  /**
   * GET /health - liveness plus a count of assets per status
   */
  router.get('/health', (_req, res) => {
    const byStatus: Record<CollateralStatus, number> = { SOUND: 0, IFFY: 0, DEFAULT: 0 };
    for (const engine of registry.list()) {
      byStatus[engine.status()]++;
    }
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      service: 'collateral-engine-api',
      collaterals: registry.size(),
      byStatus
    });
  });

  /**
   * GET /collaterals - snapshot of every registered asset
   */
  router.get('/collaterals', (_req, res) => {
    const collaterals = registry.snapshot().map(serializeSnapshot);
    res.json({ collaterals, count: collaterals.length, timestamp: new Date().toISOString() });
  });

  /**
   * GET /collaterals/:erc20 - one asset
   */
  router.get('/collaterals/:erc20', (req, res) => {
    const engine = registry.get(req.params.erc20);
    if (!engine) {
      return res.status(404).json({ error: `Unknown collateral ${req.params.erc20}` });
    }
    return res.json(serializeSnapshot(registry.snapshotOf(engine)));
  });

  /**
   * POST /collaterals/:erc20/refresh - refresh one asset and return its snapshot
   */
  router.post('/collaterals/:erc20/refresh', async (req, res) => {
    const engine = registry.get(req.params.erc20);
    if (!engine) {
      return res.status(404).json({ error: `Unknown collateral ${req.params.erc20}` });
    }
    try {
      const outcome = await engine.refresh();
      return res.json({
        ...serializeSnapshot(registry.snapshotOf(engine)),
        transition: outcome.transition
          ? { from: outcome.transition.from, to: outcome.transition.to, at: outcome.transition.at }
          : null
      });
    } catch (err) {
      return res.status(500).json({ error: formatError(err) });
    }
  });

  return router;
}
