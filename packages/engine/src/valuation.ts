// Valuation Engine - asset quantities to 18-decimal USD and back

import type { AccountInformation, Address } from '@stablecore/types';
import { calculateTokenAmountFromUsd, calculateUsdValue } from '@stablecore/utils';
import { createAmountError } from './errors';
import type { PriceOracle } from './oracle';
import type { AccountingStore } from './store';

export class ValuationEngine {
  constructor(
    private readonly store: AccountingStore,
    private readonly oracle: PriceOracle
  ) {}

  /**
   * USD value of `quantity` units of `asset`.
   *
   * A zero or negative price is treated as the feed being broken and values the
   * collateral at zero rather than failing. `assetQuantityFromUsd` does the
   * opposite and fails; the two are intentionally not unified.
   */
  usdValue(asset: Address, quantity: bigint): bigint {
    return calculateUsdValue(this.price(asset), quantity);
  }

  /**
   * Quantity of `asset` worth `usdAmount`. Fails with DIVISION_BY_ZERO on a
   * non-positive price. Truncates, losing at most one base unit.
   */
  assetQuantityFromUsd(asset: Address, usdAmount: bigint): bigint {
    const price = this.price(asset);
    if (price <= 0n) {
      throw createAmountError('DIVISION_BY_ZERO', { asset, price });
    }
    return calculateTokenAmountFromUsd(price, usdAmount);
  }

  totalCollateralValue(user: Address): bigint {
    let total = 0n;
    for (const asset of this.store.getCollateralTokens()) {
      const quantity = this.store.collateralOf(user, asset);
      total += this.usdValue(asset, quantity);
    }
    return total;
  }

  accountInformation(user: Address): AccountInformation {
    return {
      totalDscMinted: this.store.debtOf(user),
      collateralValueInUsd: this.totalCollateralValue(user),
    };
  }

  private price(asset: Address): bigint {
    return this.oracle.latestPrice(this.store.getPriceFeed(asset));
  }
}
