/**
 * DefaultMonitor: SOUND -> IFFY -> DEFAULT state machine with a grace timer
 *
 * A peg break (or a broken appreciation promise) moves the asset to IFFY. It goes
 * back to SOUND if the condition clears before `delayUntilDefault` elapses and to
 * DEFAULT otherwise. A price that stays unknown past `priceTimeout` is a default on
 * its own. DEFAULT is terminal.
 */

import type { CollateralStatus } from '../types/index.js';
import { FIX_ONE, fixMul } from '../utils/fixed.js';

import type { CollateralError } from './errors.js';
import { PegBrokenError, PriceUnknownTooLongError } from './errors.js';

export interface MonitorParams {
  targetPerRef: bigint;
  defaultThreshold: bigint;
  delayUntilDefaultSec: number;
  priceTimeoutSec: number;
}

export type MonitorSignal =
  | { priced: true; pegPrice: bigint; low: bigint; promiseBroken: boolean }
  | { priced: false; stalenessSec: number; promiseBroken: boolean };

export interface Transition {
  from: CollateralStatus;
  to: CollateralStatus;
  at: number;
  reason: CollateralError | null;
}

export class DefaultMonitor {
  private readonly pegBottom: bigint;
  private readonly pegTop: bigint;

  private current: CollateralStatus = 'SOUND';
  private iffySinceTs: number | null = null;
  private defaultedAtTs: number | null = null;

  constructor(private readonly params: MonitorParams) {
    const delta = fixMul(params.targetPerRef, params.defaultThreshold);
    this.pegBottom = params.targetPerRef - delta;
    this.pegTop = params.targetPerRef + delta;
  }

  status(): CollateralStatus {
    return this.current;
  }

  iffySince(): number | null {
    return this.iffySinceTs;
  }

  defaultedAt(): number | null {
    return this.defaultedAtTs;
  }

  /**
   * When the asset defaults (or did) if nothing changes; Infinity while SOUND
   */
  whenDefault(): number {
    if (this.current === 'DEFAULT' && this.defaultedAtTs !== null) return this.defaultedAtTs;
    if (this.current === 'IFFY' && this.iffySinceTs !== null) {
      return this.iffySinceTs + this.params.delayUntilDefaultSec;
    }
    return Number.POSITIVE_INFINITY;
  }

  pegBounds(): { bottom: bigint; top: bigint } {
    return { bottom: this.pegBottom, top: this.pegTop };
  }

  /**
   * Fractional distance of a peg price from the expected peg
   */
  deviation(pegPrice: bigint): bigint {
    const expected = this.params.targetPerRef;
    const diff = pegPrice > expected ? pegPrice - expected : expected - pegPrice;
    return (diff * FIX_ONE) / expected;
  }

  /**
   * Apply one refresh worth of signals; returns the transition, if any
   */
  evaluate(signal: MonitorSignal, now: number): Transition | null {
    if (this.current === 'DEFAULT') {
      return null;
    }

    if (!signal.priced && signal.stalenessSec > this.params.priceTimeoutSec) {
      return this.markDefault(now, new PriceUnknownTooLongError(signal.stalenessSec, this.params.priceTimeoutSec));
    }

    if (this.current === 'IFFY' && this.graceExpired(now)) {
      return this.markDefault(now, new PegBrokenError('grace period elapsed while IFFY'));
    }

    const trigger = this.trigger(signal);
    if (trigger) {
      if (this.current === 'SOUND') {
        this.iffySinceTs = now;
        const from = this.current;
        this.current = 'IFFY';
        // Zero grace period: IFFY is immediately DEFAULT
        if (this.graceExpired(now)) {
          return { ...this.markDefault(now, trigger), from };
        }
        return { from, to: 'IFFY', at: now, reason: trigger };
      }
      return null;
    }

    if (signal.priced && this.current === 'IFFY') {
      this.current = 'SOUND';
      this.iffySinceTs = null;
      return { from: 'IFFY', to: 'SOUND', at: now, reason: null };
    }

    return null;
  }

  private trigger(signal: MonitorSignal): PegBrokenError | null {
    if (signal.promiseBroken) {
      return new PegBrokenError('exchange rate fell below the exposed rate');
    }
    if (!signal.priced) {
      return null;
    }
    if (signal.pegPrice < this.pegBottom || signal.pegPrice > this.pegTop) {
      return new PegBrokenError(
        `peg price ${signal.pegPrice} outside [${this.pegBottom}, ${this.pegTop}]`
      );
    }
    if (signal.low === 0n) {
      return new PegBrokenError('low price is zero');
    }
    return null;
  }

  private graceExpired(now: number): boolean {
    return this.iffySinceTs !== null && now - this.iffySinceTs >= this.params.delayUntilDefaultSec;
  }

  private markDefault(now: number, reason: CollateralError): Transition {
    const from = this.current;
    this.current = 'DEFAULT';
    this.defaultedAtTs = now;
    this.iffySinceTs = null;
    return { from, to: 'DEFAULT', at: now, reason };
  }
}
