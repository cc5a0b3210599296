/**
 * Fixed-point helpers
 *
 * Every price, rate and fraction in the engine is an 18-decimal bigint
 * (1.0 === WAD). Inputs are expected to be non-negative.
 */

import { formatUnits, parseUnits } from 'ethers';

export const WAD = 10n ** 18n;
export const FIX_ZERO = 0n;
export const FIX_ONE = WAD;

export type Rounding = 'floor' | 'round' | 'ceil';

/**
 * (a * b) / c with explicit rounding
 *
 * @example
 * mulDiv(10n, 1n, 3n, 'ceil') // => 4n
 */
export function mulDiv(a: bigint, b: bigint, c: bigint, rounding: Rounding = 'round'): bigint {
  if (c === 0n) {
    throw new Error('mulDiv: division by zero');
  }
  if (a < 0n || b < 0n || c < 0n) {
    throw new Error(`mulDiv: negative operand (${a}, ${b}, ${c})`);
  }
  const product = a * b;
  switch (rounding) {
    case 'floor':
      return product / c;
    case 'ceil':
      return (product + c - 1n) / c;
    case 'round':
      return (product + c / 2n) / c;
  }
}

/** Fixed-point multiply */
export function fixMul(a: bigint, b: bigint, rounding: Rounding = 'round'): bigint {
  return mulDiv(a, b, WAD, rounding);
}

/** Fixed-point divide */
export function fixDiv(a: bigint, b: bigint, rounding: Rounding = 'round'): bigint {
  return mulDiv(a, WAD, b, rounding);
}

/**
 * Raise a fixed-point value to a small integer power
 * Rounds up at each step so a composed error band is never narrower than intended
 */
export function fixPowUp(base: bigint, exponent: number): bigint {
  if (!Number.isInteger(exponent) || exponent < 0) {
    throw new Error(`fixPowUp: invalid exponent ${exponent}`);
  }
  let result = FIX_ONE;
  for (let i = 0; i < exponent; i++) {
    result = fixMul(result, base, 'ceil');
  }
  return result;
}

/**
 * Parse a decimal string ("0.005", "1") into 18-decimal fixed point
 */
export function fp(value: string | number): bigint {
  return parseUnits(typeof value === 'number' ? value.toString() : value, 18);
}

/** Render fixed point as a decimal string ("1.05") */
export function formatFixed(value: bigint): string {
  return formatUnits(value, 18);
}

/** Lossy conversion for metrics and log lines only */
export function fixToNumber(value: bigint): number {
  return Number(formatUnits(value, 18));
}

/**
 * Rescale a raw integer with `decimals` places to 18 decimals
 *
 * @example
 * to18(300050000000n, 8) // => 3000500000000000000000n
 */
export function to18(raw: bigint, decimals: number): bigint {
  if (!Number.isInteger(decimals) || decimals < 0 || decimals > 36) {
    throw new Error(`Invalid decimals: ${decimals}`);
  }
  if (decimals === 18) return raw;
  if (decimals < 18) return raw * 10n ** BigInt(18 - decimals);
  return raw / 10n ** BigInt(decimals - 18);
}

export function fixMax(a: bigint, b: bigint): bigint {
  return a > b ? a : b;
}

export function fixMin(a: bigint, b: bigint): bigint {
  return a < b ? a : b;
}
