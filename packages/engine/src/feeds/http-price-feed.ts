// HTTP Price Feed - spot USD price from a JSON endpoint
//
// Engine operations are synchronous, so the network read happens in
// `refresh()` and the engine only ever sees the cached round. A feed that
// stops refreshing goes stale and the oracle adapter rejects it.

import { PROTOCOL_CONSTANTS } from '@stablecore/types';
import type { Address, RoundData } from '@stablecore/types';
import { createNetworkError, createOracleError, isEngineError } from '../errors';
import { systemClock } from '../oracle';
import type { Clock, PriceFeed } from '../oracle';

export interface HttpPriceFeedConfig {
  address: Address;
  url: string;
  /** Keys leading to the USD price in the response body, e.g. ['ethereum', 'usd'] */
  pricePath: string[];
  description?: string;
  timeoutMs?: number;
  clock?: Clock;
}

const DEFAULT_TIMEOUT_MS = 10_000;

export class HttpPriceFeed implements PriceFeed {
  readonly address: Address;
  readonly decimals = PROTOCOL_CONSTANTS.FEED_DECIMALS;
  readonly description: string;

  private readonly url: string;
  private readonly pricePath: string[];
  private readonly timeoutMs: number;
  private readonly clock: Clock;
  private round: RoundData | null = null;

  constructor(config: HttpPriceFeedConfig) {
    this.address = config.address;
    this.url = config.url;
    this.pricePath = config.pricePath;
    this.description = config.description ?? config.pricePath.join('/');
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.clock = config.clock ?? systemClock;
  }

  latestRoundData(): RoundData {
    if (!this.round) {
      throw createOracleError('ORACLE_NOT_INITIALIZED', { feed: this.address, url: this.url });
    }
    return { ...this.round };
  }

  /**
   * Fetch the current price and publish it as a new round
   */
  async refresh(): Promise<RoundData> {
    const scaledPrice = await this.fetchPrice();
    const now = this.clock();
    const roundId = (this.round?.roundId ?? 0n) + 1n;

    this.round = {
      roundId,
      answer: BigInt(Math.floor(scaledPrice)),
      startedAt: now,
      updatedAt: now,
      answeredInRound: roundId,
    };

    return { ...this.round };
  }

  private async fetchPrice(): Promise<number> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);

    let body: unknown;
    try {
      const response = await fetch(this.url, { signal: controller.signal });
      if (!response.ok) {
        throw createNetworkError('NETWORK_ERROR', `Price endpoint returned HTTP ${response.status}`);
      }
      body = await response.json();
    } catch (error) {
      if (error instanceof Error && error.name === 'AbortError') {
        throw createNetworkError('TIMEOUT', `Price request timed out after ${this.timeoutMs}ms`, error);
      }
      if (isEngineError(error)) {
        throw error;
      }
      throw createNetworkError(
        'NETWORK_ERROR',
        `Price request failed: ${error instanceof Error ? error.message : String(error)}`,
        error instanceof Error ? error : undefined
      );
    } finally {
      clearTimeout(timer);
    }

    // Scaled to feed decimals; must stay finite to become a bigint
    const price = readNumber(body, this.pricePath);
    const scaled = price === null ? NaN : price * 10 ** this.decimals;
    if (!Number.isFinite(scaled) || scaled <= 0) {
      throw createNetworkError('NETWORK_ERROR', `No usable price at ${this.pricePath.join('.')}`);
    }
    return scaled;
  }
}

function readNumber(body: unknown, path: string[]): number | null {
  let current: unknown = body;
  for (const key of path) {
    if (typeof current !== 'object' || current === null || !(key in current)) {
      return null;
    }
    current = Reflect.get(current, key);
  }

  const parsed = typeof current === 'string' ? parseFloat(current) : current;
  if (typeof parsed === 'number' && Number.isFinite(parsed)) return parsed;
  return null;
}
