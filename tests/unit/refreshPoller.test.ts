import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

import { startRefreshPoller } from '../../src/polling/refreshPoller.js';
import type { RefreshReport } from '../../src/registry/CollateralRegistry.js';

const emptyReport: RefreshReport = { refreshed: [], failed: [], transitions: [] };

describe('refreshPoller', () => {
  const refreshAll = vi.fn<[], Promise<RefreshReport>>();
  const logger = {
    info: vi.fn(),
    error: vi.fn()
  };

  beforeEach(() => {
    vi.useFakeTimers();
    vi.clearAllMocks();
    refreshAll.mockReset();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('invokes immediate tick and subsequent interval', async () => {
    refreshAll.mockResolvedValue(emptyReport);

    const poller = startRefreshPoller({ registry: { refreshAll }, intervalMs: 5000, logger });

    // Immediate tick
    expect(refreshAll).toHaveBeenCalledTimes(1);

    await vi.advanceTimersByTimeAsync(5000);
    await vi.advanceTimersByTimeAsync(0);
    expect(refreshAll).toHaveBeenCalledTimes(2);
    expect(poller.cycles()).toBe(2);

    poller.stop();
    expect(poller.isRunning()).toBe(false);
    await vi.advanceTimersByTimeAsync(5000);
    // no further calls
    expect(refreshAll).toHaveBeenCalledTimes(2);
  });

  it('continues after an error', async () => {
    refreshAll
      .mockRejectedValueOnce(new Error('boom'))
      .mockResolvedValue(emptyReport);

    const poller = startRefreshPoller({ registry: { refreshAll }, intervalMs: 2000, logger });

    await vi.advanceTimersByTimeAsync(2000); // error cycle
    await vi.advanceTimersByTimeAsync(2000); // recovery cycle
    await vi.advanceTimersByTimeAsync(0);
    expect(refreshAll).toHaveBeenCalledTimes(3);
    expect(logger.error).toHaveBeenCalledWith('[refresh] sweep error: boom');
    expect(poller.cycles()).toBe(3);

    poller.stop();
  });

  it('skips a tick while the previous sweep is still running', async () => {
    let finish: (report: RefreshReport) => void = () => undefined;
    refreshAll.mockImplementationOnce(
      () => new Promise<RefreshReport>(resolve => { finish = resolve; })
    );

    const poller = startRefreshPoller({ registry: { refreshAll }, intervalMs: 1000, logger });

    await vi.advanceTimersByTimeAsync(1000);
    expect(refreshAll).toHaveBeenCalledTimes(1);
    expect(logger.info).toHaveBeenCalledWith('[refresh] previous sweep still running, skipping tick');
    expect(poller.cycles()).toBe(0);

    finish(emptyReport);
    await vi.advanceTimersByTimeAsync(0);
    expect(poller.cycles()).toBe(1);

    poller.stop();
  });

  it('hands each report to the callback and logs transitions', async () => {
    const report: RefreshReport = {
      refreshed: ['0xabc'],
      failed: [],
      transitions: [{ erc20: '0xabc', from: 'SOUND', to: 'IFFY', at: 10, reason: null }]
    };
    refreshAll.mockResolvedValue(report);
    const onReport = vi.fn();

    const poller = startRefreshPoller({ registry: { refreshAll }, intervalMs: 1000, logger, onReport });
    await vi.advanceTimersByTimeAsync(0);

    expect(onReport).toHaveBeenCalledWith(report);
    expect(logger.info).toHaveBeenCalledWith(
      '[refresh] sweep done refreshed=1 failed=0 transitions=0xabc:SOUND->IFFY'
    );

    poller.stop();
  });
});
