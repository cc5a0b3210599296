/**
 * ChainlinkFeed: OracleFeed backed by a Chainlink AggregatorV3
 *
 * Answers are rescaled to 18 decimals. Non-positive answers are passed through
 * untouched so the pricer can classify them. A round answered in an earlier round
 * rejects with IncompleteRoundError, which the engine treats as an unreadable feed.
 */

import { Contract, type ContractRunner } from 'ethers';

import { IncompleteRoundError } from '../collateral/errors.js';
import type { FeedRound, OracleFeed } from '../types/index.js';
import { to18 } from '../utils/fixed.js';

export const AGGREGATOR_V3_ABI = [
  'function decimals() external view returns (uint8)',
  'function latestRoundData() external view returns (uint80 roundId, int256 answer, uint256 startedAt, uint256 updatedAt, uint80 answeredInRound)'
];

export interface AggregatorRound {
  roundId: bigint;
  answer: bigint;
  updatedAt: bigint;
  answeredInRound: bigint;
}

export interface AggregatorV3 {
  decimals(): Promise<number>;
  latestRoundData(): Promise<AggregatorRound>;
}

/**
 * Wrap an on-chain aggregator
 */
export function aggregatorAt(address: string, runner: ContractRunner): AggregatorV3 {
  const contract = new Contract(address, AGGREGATOR_V3_ABI, runner);
  return {
    decimals: async () => Number(await contract.getFunction('decimals').staticCall()),
    latestRoundData: async () => {
      const roundData = await contract.getFunction('latestRoundData').staticCall();
      return {
        roundId: BigInt(roundData[0]),
        answer: BigInt(roundData[1]),
        updatedAt: BigInt(roundData[3]),
        answeredInRound: BigInt(roundData[4])
      };
    }
  };
}

export class ChainlinkFeed implements OracleFeed {
  private decimals: number | null = null;

  constructor(
    public readonly address: string,
    private readonly aggregator: AggregatorV3
  ) {}

  static connect(address: string, runner: ContractRunner): ChainlinkFeed {
    return new ChainlinkFeed(address, aggregatorAt(address, runner));
  }

  async latestRound(): Promise<FeedRound> {
    if (this.decimals === null) {
      this.decimals = await this.aggregator.decimals();
    }

    const round = await this.aggregator.latestRoundData();
    if (round.answeredInRound < round.roundId) {
      throw new IncompleteRoundError(this.address, round.roundId, round.answeredInRound);
    }

    return {
      answer: to18(round.answer, this.decimals),
      updatedAt: Number(round.updatedAt)
    };
  }
}
