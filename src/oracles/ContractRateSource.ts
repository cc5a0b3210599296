/**
 * ContractRateSource: exchange rate of a wrapped token read from chain
 *
 * Supported shapes:
 * - erc4626: vault.convertToAssets(10^shareDecimals)
 * - pricePerShare: token.pricePerShare() (e.g. sfrxETH)
 * - dieselPool: pool.fromDiesel(10^shareDecimals) (Gearbox diesel tokens)
 */

import { Contract, type ContractRunner } from 'ethers';

import type { ExchangeRateSource } from '../types/index.js';
import { to18 } from '../utils/fixed.js';

export type RateMethod = 'erc4626' | 'pricePerShare' | 'dieselPool';

export const RATE_SOURCE_ABI = [
  'function convertToAssets(uint256 shares) external view returns (uint256)',
  'function pricePerShare() external view returns (uint256)',
  'function fromDiesel(uint256 amount) external view returns (uint256)'
];

export interface RateSourceOptions {
  method: RateMethod;
  /** Contract the rate is read from (the vault, token or pool) */
  address: string;
  /** Decimals of the wrapped token (shares) */
  shareDecimals: number;
  /** Decimals of the rate the contract returns (the reference asset) */
  refDecimals: number;
}

function rateCall(contract: Contract, method: RateMethod, oneShare: bigint): () => Promise<bigint> {
  switch (method) {
    case 'erc4626':
      return async () => BigInt(await contract.getFunction('convertToAssets').staticCall(oneShare));
    case 'pricePerShare':
      return async () => BigInt(await contract.getFunction('pricePerShare').staticCall());
    case 'dieselPool':
      return async () => BigInt(await contract.getFunction('fromDiesel').staticCall(oneShare));
  }
}

export class ContractRateSource implements ExchangeRateSource {
  constructor(
    public readonly address: string,
    private readonly readRaw: () => Promise<bigint>,
    private readonly refDecimals: number
  ) {}

  static connect(options: RateSourceOptions, runner: ContractRunner): ContractRateSource {
    const contract = new Contract(options.address, RATE_SOURCE_ABI, runner);
    const oneShare = 10n ** BigInt(options.shareDecimals);
    return new ContractRateSource(
      options.address,
      rateCall(contract, options.method, oneShare),
      options.refDecimals
    );
  }

  async refPerTok(): Promise<bigint> {
    return to18(await this.readRaw(), this.refDecimals);
  }
}
