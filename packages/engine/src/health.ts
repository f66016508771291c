// Health Factor Engine - solvency ratio and the gate every mutation passes

import type { AccountStatus, Address } from '@stablecore/types';
import { calculateHealthFactor, isHealthFactorHealthy } from '@stablecore/utils';
import { createHealthError } from './errors';
import type { AccountingStore } from './store';
import type { ValuationEngine } from './valuation';

export class HealthFactorEngine {
  constructor(
    private readonly store: AccountingStore,
    private readonly valuation: ValuationEngine
  ) {}

  /**
   * Threshold-adjusted collateral value over debt, 18 decimals.
   * Accounts without debt return MAX_UINT256.
   */
  healthFactor(user: Address): bigint {
    const { totalDscMinted, collateralValueInUsd } = this.valuation.accountInformation(user);
    return calculateHealthFactor(totalDscMinted, collateralValueInUsd);
  }

  calculateHealthFactor(totalDscMinted: bigint, collateralValueInUsd: bigint): bigint {
    return calculateHealthFactor(totalDscMinted, collateralValueInUsd);
  }

  status(user: Address): AccountStatus {
    if (this.store.debtOf(user) === 0n) return 'healthy';
    return isHealthFactorHealthy(this.healthFactor(user)) ? 'healthy' : 'liquidatable';
  }

  /**
   * Fails with HEALTH_FACTOR_TOO_LOW for an indebted account below the minimum.
   * Debt-free accounts are not valued at all.
   */
  assertHealthy(user: Address): void {
    if (this.store.debtOf(user) === 0n) return;

    const healthFactor = this.healthFactor(user);
    if (!isHealthFactorHealthy(healthFactor)) {
      throw createHealthError('HEALTH_FACTOR_TOO_LOW', { user, healthFactor });
    }
  }
}
