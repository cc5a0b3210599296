/**
 * Collateral error taxonomy
 *
 * Only ConfigInvalidError and PriceUnavailableError are ever thrown to callers.
 * The others describe why a refresh left an asset unpriceable, IFFY or DEFAULT
 * and travel on results, events and log lines.
 */

export type CollateralErrorCode =
  | 'CONFIG_INVALID'
  | 'FEED_STALE'
  | 'FEED_INCOMPLETE_ROUND'
  | 'PRICE_UNKNOWN_TOO_LONG'
  | 'PEG_BROKEN'
  | 'PRICE_UNAVAILABLE';

export class CollateralError extends Error {
  constructor(
    public readonly code: CollateralErrorCode,
    message: string,
    public readonly underlyingError?: unknown
  ) {
    super(message);
    this.name = 'CollateralError';
  }
}

export class ConfigInvalidError extends CollateralError {
  constructor(public readonly field: string, message: string) {
    super('CONFIG_INVALID', `Invalid collateral config (${field}): ${message}`);
    this.name = 'ConfigInvalidError';
  }
}

export class FeedStaleError extends CollateralError {
  constructor(
    public readonly feed: string,
    public readonly ageSec: number,
    public readonly timeoutSec: number
  ) {
    super('FEED_STALE', `Feed ${feed} is stale: age=${ageSec}s timeout=${timeoutSec}s`);
    this.name = 'FeedStaleError';
  }
}

export class IncompleteRoundError extends CollateralError {
  constructor(
    public readonly feed: string,
    public readonly roundId: bigint,
    public readonly answeredInRound: bigint
  ) {
    super(
      'FEED_INCOMPLETE_ROUND',
      `Feed ${feed} round ${roundId} was answered in earlier round ${answeredInRound}`
    );
    this.name = 'IncompleteRoundError';
  }
}

export class PriceUnknownTooLongError extends CollateralError {
  constructor(public readonly stalenessSec: number, public readonly priceTimeoutSec: number) {
    super(
      'PRICE_UNKNOWN_TOO_LONG',
      `Price unknown for ${stalenessSec}s, beyond price timeout ${priceTimeoutSec}s`
    );
    this.name = 'PriceUnknownTooLongError';
  }
}

export class PegBrokenError extends CollateralError {
  constructor(message: string) {
    super('PEG_BROKEN', message);
    this.name = 'PegBrokenError';
  }
}

export class PriceUnavailableError extends CollateralError {
  constructor(public readonly erc20: string, public readonly reason: string) {
    super('PRICE_UNAVAILABLE', `No price available for ${erc20}: ${reason}`);
    this.name = 'PriceUnavailableError';
  }
}

/**
 * Render any thrown value as a log-friendly string
 */
export function formatError(err: unknown): string {
  if (!err) return 'Unknown error';
  if (typeof err === 'string') return err;
  if (err instanceof Error) return err.message || err.toString();
  try { return JSON.stringify(err); } catch { return String(err); }
}
