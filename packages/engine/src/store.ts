/**
 * Accounting Store
 *
 * Ledger of per-user collateral (by asset) and minted debt, plus the
 * collateral registry fixed at construction. Holds no token balances itself:
 * custody lives in the token ledgers, this is the engine's book of claims.
 */

import type { Address } from '@stablecore/types';
import { EngineError, createAmountError } from './errors';
import type { PriceFeed } from './oracle';
import type { Erc20 } from './token';
import { cloneNested } from './transaction';
import type { Checkpointable, Restore } from './transaction';

export class AccountingStore implements Checkpointable {
  /** Registration order, duplicates kept */
  private readonly assets: Address[] = [];
  private readonly feeds = new Map<Address, PriceFeed>();
  private readonly tokens = new Map<Address, Erc20>();

  private collateral = new Map<Address, Map<Address, bigint>>();
  private debt = new Map<Address, bigint>();

  constructor(collateralTokens: readonly Erc20[], priceFeeds: readonly PriceFeed[]) {
    if (collateralTokens.length !== priceFeeds.length) {
      throw new EngineError(
        'CONFIGURATION_INVALID',
        'Token addresses and price feed addresses must be the same length',
        { context: { tokens: collateralTokens.length, feeds: priceFeeds.length } }
      );
    }

    collateralTokens.forEach((token, i) => {
      this.feeds.set(token.address, priceFeeds[i]);
      this.tokens.set(token.address, token);
      this.assets.push(token.address);
    });
  }

  // ==========================================================================
  // Registry
  // ==========================================================================

  getCollateralTokens(): readonly Address[] {
    return [...this.assets];
  }

  /** Distinct token ledgers, in registration order */
  getTokenLedgers(): Erc20[] {
    return [...this.tokens.values()];
  }

  isAllowed(asset: Address): boolean {
    return this.feeds.has(asset);
  }

  getToken(asset: Address): Erc20 {
    const token = this.tokens.get(asset);
    if (!token) {
      throw notAllowed(asset);
    }
    return token;
  }

  getPriceFeed(asset: Address): PriceFeed {
    const feed = this.feeds.get(asset);
    if (!feed) {
      throw notAllowed(asset);
    }
    return feed;
  }

  // ==========================================================================
  // Reads
  // ==========================================================================

  collateralOf(user: Address, asset: Address): bigint {
    return this.collateral.get(user)?.get(asset) ?? 0n;
  }

  debtOf(user: Address): bigint {
    return this.debt.get(user) ?? 0n;
  }

  totalDebt(): bigint {
    let total = 0n;
    for (const amount of this.debt.values()) {
      total += amount;
    }
    return total;
  }

  /** Every account that has ever held collateral or debt */
  accounts(): Address[] {
    return [...new Set([...this.collateral.keys(), ...this.debt.keys()])];
  }

  // ==========================================================================
  // Mutations
  // ==========================================================================

  recordDeposit(user: Address, asset: Address, quantity: bigint): void {
    if (quantity <= 0n) {
      throw createAmountError('MUST_BE_MORE_THAN_ZERO', { quantity });
    }
    if (!this.isAllowed(asset)) {
      throw notAllowed(asset);
    }
    this.setCollateral(user, asset, this.collateralOf(user, asset) + quantity);
  }

  recordWithdrawal(user: Address, asset: Address, quantity: bigint): void {
    const current = this.collateralOf(user, asset);
    if (quantity > current) {
      throw createAmountError('UNDERFLOW', { user, asset, available: current, requested: quantity });
    }
    this.setCollateral(user, asset, current - quantity);
  }

  recordMint(user: Address, amount: bigint): void {
    this.debt.set(user, this.debtOf(user) + amount);
  }

  recordBurn(user: Address, amount: bigint): void {
    const current = this.debtOf(user);
    if (amount > current) {
      throw createAmountError('UNDERFLOW', { user, debt: current, requested: amount });
    }
    this.debt.set(user, current - amount);
  }

  checkpoint(): Restore {
    const collateral = cloneNested(this.collateral);
    const debt = new Map(this.debt);

    return () => {
      this.collateral = collateral;
      this.debt = debt;
    };
  }

  private setCollateral(user: Address, asset: Address, quantity: bigint): void {
    let balances = this.collateral.get(user);
    if (!balances) {
      balances = new Map();
      this.collateral.set(user, balances);
    }
    balances.set(asset, quantity);
  }
}

function notAllowed(asset: Address): EngineError {
  return new EngineError('COLLATERAL_NOT_ALLOWED', `Token ${asset} is not allowed as collateral`, {
    context: { asset },
  });
}
