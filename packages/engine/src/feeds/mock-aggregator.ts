// Mock Aggregator - in-process feed with directly settable rounds

import type { Address, RoundData } from '@stablecore/types';
import { systemClock } from '../oracle';
import type { Clock, PriceFeed } from '../oracle';

export class MockV3Aggregator implements PriceFeed {
  readonly description: string;
  private round: RoundData;
  private readonly history = new Map<bigint, RoundData>();

  constructor(
    readonly address: Address,
    readonly decimals: number,
    initialAnswer: bigint,
    private readonly clock: Clock = systemClock,
    description = 'mock / USD'
  ) {
    this.description = description;
    this.round = { roundId: 0n, answer: 0n, startedAt: 0, updatedAt: 0, answeredInRound: 0n };
    this.updateAnswer(initialAnswer);
  }

  latestRoundData(): RoundData {
    return { ...this.round };
  }

  getRoundData(roundId: bigint): RoundData | null {
    const round = this.history.get(roundId);
    return round ? { ...round } : null;
  }

  /** Report a new answer as the next round, timestamped now */
  updateAnswer(answer: bigint): void {
    const now = this.clock();
    const roundId = this.round.roundId + 1n;
    this.record({ roundId, answer, startedAt: now, updatedAt: now, answeredInRound: roundId });
  }

  /** Overwrite the latest round wholesale */
  updateRoundData(roundId: bigint, answer: bigint, updatedAt: number, startedAt: number): void {
    this.record({ roundId, answer, startedAt, updatedAt, answeredInRound: roundId });
  }

  private record(round: RoundData): void {
    this.round = round;
    this.history.set(round.roundId, round);
  }
}
