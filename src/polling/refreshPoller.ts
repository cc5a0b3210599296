import type { CollateralRegistry, RefreshReport } from '../registry/CollateralRegistry.js';
import { formatError } from '../collateral/errors.js';

export interface RefreshPollerOptions {
  registry: Pick<CollateralRegistry, 'refreshAll'>;
  intervalMs: number;
  logger?: { info: (...args: unknown[]) => void; error: (...args: unknown[]) => void };
  onReport?: (report: RefreshReport) => void;
}

export interface RefreshPollerHandle {
  stop(): void;
  isRunning(): boolean;
  /** Completed sweeps, failed ones included */
  cycles(): number;
}

export function startRefreshPoller(opts: RefreshPollerOptions): RefreshPollerHandle {
  const { registry, intervalMs, logger = console, onReport } = opts;

  let active = true;
  let inFlight = false;
  let completed = 0;

  logger.info(`[refresh] starting poller (interval=${intervalMs}ms)`);

  const tick = async (): Promise<void> => {
    if (!active) return;
    // Skip overlapping sweeps; the next interval picks up fresh state anyway
    if (inFlight) {
      logger.info('[refresh] previous sweep still running, skipping tick');
      return;
    }

    inFlight = true;
    try {
      const report = await registry.refreshAll();
      const transitions = report.transitions.map(t => `${t.erc20}:${t.from}->${t.to}`).join(',');
      logger.info(
        `[refresh] sweep done refreshed=${report.refreshed.length} failed=${report.failed.length}` +
        (transitions ? ` transitions=${transitions}` : '')
      );
      onReport?.(report);
    } catch (err: unknown) {
      logger.error(`[refresh] sweep error: ${formatError(err)}`);
    } finally {
      inFlight = false;
      completed++;
    }
  };

  // Immediate first run
  void tick();
  const id = setInterval(() => void tick(), intervalMs);

  return {
    stop() {
      if (active) {
        active = false;
        clearInterval(id);
        logger.info('[refresh] poller stopped');
      }
    },
    isRunning() {
      return active;
    },
    cycles() {
      return completed;
    }
  };
}
