// Oracle Adapter - staleness-checked reads from per-asset price feeds

import { PROTOCOL_CONSTANTS } from '@stablecore/types';
import type { Address, RoundData } from '@stablecore/types';
import { createOracleError, isEngineError } from './errors';

/** Unix time in seconds */
export type Clock = () => number;

export const systemClock: Clock = () => Math.floor(Date.now() / 1000);

/**
 * An aggregator-style feed. `answer` carries `decimals` decimals (8 for USD pairs).
 */
export interface PriceFeed {
  readonly address: Address;
  readonly decimals: number;
  readonly description: string;
  latestRoundData(): RoundData;
}

export interface OracleOptions {
  /** Rounds older than this are rejected; 0 turns the check off */
  maxPriceAgeSeconds?: number;
  clock?: Clock;
}

/**
 * Reads the latest round of a feed and rejects rounds that are stale.
 *
 * A stale feed fails every operation that values collateral, liquidations
 * included. That freeze is the accepted cost of never acting on an old price.
 */
export class PriceOracle {
  readonly maxPriceAgeSeconds: number;
  private readonly clock: Clock;

  constructor(options: OracleOptions = {}) {
    this.maxPriceAgeSeconds = options.maxPriceAgeSeconds ?? PROTOCOL_CONSTANTS.DEFAULT_MAX_PRICE_AGE_SECONDS;
    this.clock = options.clock ?? systemClock;
  }

  latestRoundData(feed: PriceFeed): RoundData {
    const round = feed.latestRoundData();
    if (this.maxPriceAgeSeconds === 0) return round;

    if (round.updatedAt === 0 || round.answeredInRound < round.roundId) {
      throw createOracleError('ORACLE_STALE', {
        feed: feed.address,
        roundId: round.roundId,
        answeredInRound: round.answeredInRound,
        updatedAt: round.updatedAt,
      });
    }

    const age = this.clock() - round.updatedAt;
    if (age > this.maxPriceAgeSeconds) {
      throw createOracleError('ORACLE_STALE', {
        feed: feed.address,
        ageSeconds: age,
        maxPriceAgeSeconds: this.maxPriceAgeSeconds,
      });
    }

    return round;
  }

  /** Latest answer of `feed`; signed, may be zero or negative */
  latestPrice(feed: PriceFeed): bigint {
    return this.latestRoundData(feed).answer;
  }

  isStale(feed: PriceFeed): boolean {
    try {
      this.latestRoundData(feed);
      return false;
    } catch (error) {
      if (isEngineError(error, 'ORACLE_STALE')) {
        return true;
      }
      throw error;
    }
  }
}
