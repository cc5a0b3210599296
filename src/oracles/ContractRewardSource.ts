/**
 * ContractRewardSource: claims a wrapped token's reward stream for the holder
 *
 * The claimed amount is the holder's reward-token balance delta across the claim
 * transaction, so rewards sitting in the wallet beforehand are not counted.
 */

import { Contract, type ContractRunner } from 'ethers';

import type { RewardSource } from '../types/index.js';

export const REWARD_SOURCE_ABI = ['function claimRewards() external'];
export const ERC20_BALANCE_ABI = ['function balanceOf(address owner) external view returns (uint256)'];

export interface RewardHooks {
  /** Submit the claim and wait for it to be mined */
  claim(): Promise<void>;
  balanceOfHolder(): Promise<bigint>;
}

export class ContractRewardSource implements RewardSource {
  constructor(
    public readonly rewardToken: string,
    private readonly hooks: RewardHooks
  ) {}

  static connect(
    options: { claimFrom: string; rewardToken: string; holder: string },
    runner: ContractRunner
  ): ContractRewardSource {
    const claimable = new Contract(options.claimFrom, REWARD_SOURCE_ABI, runner);
    const token = new Contract(options.rewardToken, ERC20_BALANCE_ABI, runner);

    return new ContractRewardSource(options.rewardToken, {
      claim: async () => {
        const tx = await claimable.getFunction('claimRewards').send();
        await tx.wait();
      },
      balanceOfHolder: async () => BigInt(await token.getFunction('balanceOf').staticCall(options.holder))
    });
  }

  async claim(): Promise<bigint> {
    const before = await this.hooks.balanceOfHolder();
    await this.hooks.claim();
    const after = await this.hooks.balanceOfHolder();
    return after > before ? after - before : 0n;
  }
}
