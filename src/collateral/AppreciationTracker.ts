/**
 * AppreciationTracker: high-water mark of a wrapped token's exchange rate
 *
 * The exposed rate is the peak scaled down by the revenue hiding fraction, so a
 * transient spike or a small loss in the underlying never has to be unwound:
 * the protocol only ever promises (1 - h) of the best rate it has seen.
 */

import { FIX_ONE, fixMul } from '../utils/fixed.js';

export class AppreciationTracker {
  private readonly revenueShowing: bigint;
  private peak = 0n;
  private lastRaw: bigint | null = null;

  constructor(revenueHiding: bigint) {
    if (revenueHiding < 0n || revenueHiding >= FIX_ONE) {
      throw new Error(`revenueHiding must be within [0, 1), got ${revenueHiding}`);
    }
    this.revenueShowing = FIX_ONE - revenueHiding;
  }

  /**
   * Record a raw rate and return the exposed rate
   */
  update(rawRate: bigint): bigint {
    if (rawRate < 0n) {
      throw new Error(`Negative exchange rate: ${rawRate}`);
    }
    this.lastRaw = rawRate;
    if (rawRate > this.peak) {
      this.peak = rawRate;
    }
    return this.exposedRate();
  }

  exposedRate(): bigint {
    return fixMul(this.peak, this.revenueShowing, 'floor');
  }

  peakRate(): bigint {
    return this.peak;
  }

  lastRawRate(): bigint | null {
    return this.lastRaw;
  }

  /**
   * True when the rate has fallen below what the exposed rate already promised
   */
  isPromiseBroken(rawRate: bigint): boolean {
    return rawRate < this.exposedRate();
  }
}
