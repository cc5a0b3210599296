// Unit tests for ContractRateSource and ContractRewardSource
import { describe, it, expect, vi } from 'vitest';

import { ContractRateSource, RATE_SOURCE_ABI } from '../../src/oracles/ContractRateSource.js';
import { ContractRewardSource, type RewardHooks } from '../../src/oracles/ContractRewardSource.js';
import { fp } from '../../src/utils/fixed.js';
import { RATE, REWARD_TOKEN } from '../helpers/fakes.js';
import { fakeRunner } from '../helpers/runner.js';

describe('ContractRateSource', () => {
  it('should convert one share through an ERC4626 vault', async () => {
    const runner = fakeRunner(RATE_SOURCE_ABI, { convertToAssets: () => [1_020_000n] });
    const source = ContractRateSource.connect(
      { method: 'erc4626', address: RATE, shareDecimals: 6, refDecimals: 6 },
      runner
    );

    await expect(source.refPerTok()).resolves.toBe(fp('1.02'));
    expect(runner.calls).toHaveLength(1);
    expect(runner.calls[0].args).toEqual([1_000_000n]);
  });

  it('should read pricePerShare', async () => {
    const runner = fakeRunner(RATE_SOURCE_ABI, { pricePerShare: () => [fp('1.05')] });
    const source = ContractRateSource.connect(
      { method: 'pricePerShare', address: RATE, shareDecimals: 18, refDecimals: 18 },
      runner
    );

    await expect(source.refPerTok()).resolves.toBe(fp('1.05'));
  });

  it('should convert diesel tokens through the pool', async () => {
    const runner = fakeRunner(RATE_SOURCE_ABI, { fromDiesel: () => [110_000_000n] });
    const source = ContractRateSource.connect(
      { method: 'dieselPool', address: RATE, shareDecimals: 8, refDecimals: 8 },
      runner
    );

    await expect(source.refPerTok()).resolves.toBe(fp('1.1'));
    expect(runner.calls[0]).toMatchObject({ method: 'fromDiesel', args: [100_000_000n] });
  });

  it('should propagate read failures', async () => {
    const source = new ContractRateSource(RATE, async () => {
      throw new Error('call reverted');
    }, 18);
    await expect(source.refPerTok()).rejects.toThrow('call reverted');
  });
});

describe('ContractRewardSource', () => {
  function hooks(balances: bigint[]) {
    let reads = 0;
    const claim = vi.fn(async (): Promise<void> => undefined);
    const typed: RewardHooks = {
      claim,
      balanceOfHolder: async () => balances[Math.min(reads++, balances.length - 1)]
    };
    return { claim, typed };
  }

  it('should report the balance gained across the claim', async () => {
    const { claim, typed } = hooks([10n, 25n]);
    const source = new ContractRewardSource(REWARD_TOKEN, typed);

    await expect(source.claim()).resolves.toBe(15n);
    expect(claim).toHaveBeenCalledTimes(1);
    expect(source.rewardToken).toBe(REWARD_TOKEN);
  });

  it('should never report a negative amount', async () => {
    const source = new ContractRewardSource(REWARD_TOKEN, hooks([10n, 4n]).typed);
    await expect(source.claim()).resolves.toBe(0n);
  });
});
