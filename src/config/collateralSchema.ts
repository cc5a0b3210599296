/**
 * Schema of the collateral definitions file
 *
 * Fractions and amounts are decimal strings ("0.005", "1000000") parsed into
 * 18-decimal fixed point; durations are integer seconds.
 */

import { readFileSync } from 'fs';

import { isAddress } from 'ethers';
import { z } from 'zod';

import { fp } from '../utils/fixed.js';

const address = z.string().refine(value => isAddress(value), { message: 'invalid address' });

const fixed = z
  .string()
  .regex(/^\d+(\.\d{1,18})?$/, 'expected a non-negative decimal string')
  .transform(value => fp(value));

const seconds = z.number().int().nonnegative();

const feed = z.object({
  address,
  timeoutSec: seconds
});

export const pricingSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('fiat'), refUnitFeed: feed }),
  z.object({ kind: z.literal('selfReferential'), targetUnitFeed: feed }),
  z.object({ kind: z.literal('nonFiat'), targetPerRefFeed: feed, uoaPerTargetFeed: feed })
]);

export const rateSchema = z.object({
  method: z.enum(['erc4626', 'pricePerShare', 'dieselPool']),
  address,
  shareDecimals: z.number().int().min(0).max(36).default(18),
  refDecimals: z.number().int().min(0).max(36).default(18)
});

export const rewardsSchema = z.object({
  claimFrom: address,
  rewardToken: address
});

export const collateralDefinitionSchema = z.object({
  erc20: address,
  targetName: z.string().min(1),
  revenueHiding: fixed.default('0'),
  oracleError: fixed,
  maxTradeVolume: fixed,
  defaultThreshold: fixed,
  delayUntilDefaultSec: seconds,
  priceTimeoutSec: seconds,
  targetPerRef: fixed.optional(),
  pricing: pricingSchema,
  rate: rateSchema,
  rewards: rewardsSchema.optional()
});

export const collateralFileSchema = z.object({
  collaterals: z.array(collateralDefinitionSchema)
});

export type CollateralDefinition = z.infer<typeof collateralDefinitionSchema>;
export type FeedDefinition = z.infer<typeof feed>;
export type RateDefinition = z.infer<typeof rateSchema>;
export type RewardsDefinition = z.infer<typeof rewardsSchema>;

export function parseCollateralFile(raw: unknown): CollateralDefinition[] {
  return collateralFileSchema.parse(raw).collaterals;
}

export function loadCollateralFile(path: string): CollateralDefinition[] {
  const raw: unknown = JSON.parse(readFileSync(path, 'utf-8'));
  return parseCollateralFile(raw);
}
