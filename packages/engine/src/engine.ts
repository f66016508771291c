/**
 * Stablecoin Engine
 *
 * Orchestrates deposits, mints, redemptions, burns and liquidations over the
 * accounting store, keeping every indebted account at or above the minimum
 * health factor.
 *
 * Each entry point is one transaction:
 *   validate -> ledger effects + event -> token interaction -> check result -> health gate
 * Any failure rolls back the store, the stable token and every collateral
 * token, and drops the events the call emitted.
 */

import { MIN_HEALTH_FACTOR, PROTOCOL_CONSTANTS } from '@stablecore/types';
import type {
  AccountInformation,
  AccountSnapshot,
  AccountStatus,
  Address,
  EngineEvent,
  EngineOperation,
  LiquidationResult,
} from '@stablecore/types';
import { validateEngineConfig } from '@stablecore/config';
import { calculateLiquidationBonus, isHealthFactorHealthy, isValidAddress } from '@stablecore/utils';
import {
  EngineError,
  createAmountError,
  createHealthError,
  createLogger,
  createTokenError,
  wrapError,
} from './errors';
import type { Logger } from './errors';
import { HealthFactorEngine } from './health';
import { PriceOracle } from './oracle';
import type { Clock, PriceFeed } from './oracle';
import { AccountingStore } from './store';
import type { Erc20, StableToken } from './token';
import { ReentrancyGuard, runAtomically } from './transaction';
import type { Checkpointable } from './transaction';
import { ValuationEngine } from './valuation';

// ============================================================================
// Types
// ============================================================================

export interface StablecoinEngineConfig {
  /** Custody account holding deposited collateral; must own the stable token */
  address: Address;
  collateralTokens: readonly Erc20[];
  priceFeeds: readonly PriceFeed[];
  dsc: StableToken;
  maxPriceAgeSeconds?: number;
  /** Newest events kept for `getEvents()`; unbounded when omitted */
  maxRetainedEvents?: number;
  clock?: Clock;
  logger?: Logger;
}

export type EngineListener = (event: EngineEvent) => void;

// ============================================================================
// Engine
// ============================================================================

export class StablecoinEngine {
  readonly address: Address;

  private readonly dsc: StableToken;
  private readonly store: AccountingStore;
  private readonly oracle: PriceOracle;
  private readonly valuation: ValuationEngine;
  private readonly health: HealthFactorEngine;
  private readonly guard = new ReentrancyGuard();
  private readonly logger: Logger;

  private readonly listeners = new Set<EngineListener>();
  private readonly eventLog: EngineEvent[] = [];
  private readonly maxRetainedEvents: number | undefined;
  private pending: EngineEvent[] = [];
  private readonly deliveries: EngineEvent[] = [];
  private dispatching = false;

  constructor(config: StablecoinEngineConfig) {
    const validation = validateEngineConfig({
      collateralTokens: config.collateralTokens.map((t) => t.address),
      priceFeeds: config.priceFeeds.map((f) => f.address),
      maxPriceAgeSeconds: config.maxPriceAgeSeconds,
      maxRetainedEvents: config.maxRetainedEvents,
    });
    if (!validation.success) {
      throw new EngineError('CONFIGURATION_INVALID', 'Invalid engine configuration', {
        context: { errors: validation.errors },
      });
    }
    if (!isValidAddress(config.address)) {
      throw new EngineError('CONFIGURATION_INVALID', `Invalid engine address: ${config.address}`);
    }

    this.address = config.address;
    this.dsc = config.dsc;
    this.store = new AccountingStore(config.collateralTokens, config.priceFeeds);
    this.oracle = new PriceOracle({
      maxPriceAgeSeconds: validation.data.maxPriceAgeSeconds,
      clock: config.clock,
    });
    this.valuation = new ValuationEngine(this.store, this.oracle);
    this.health = new HealthFactorEngine(this.store, this.valuation);
    this.maxRetainedEvents = validation.data.maxRetainedEvents;
    this.logger = config.logger ?? createLogger('StablecoinEngine');
  }

  // ==========================================================================
  // Entry Points
  // ==========================================================================

  /**
   * Deposit collateral and mint stable tokens in one transaction
   */
  depositCollateralAndMintDsc(
    caller: Address,
    asset: Address,
    amountCollateral: bigint,
    amountDscToMint: bigint
  ): void {
    this.execute('depositCollateralAndMintDsc', caller, () => {
      this.deposit(caller, asset, amountCollateral);
      this.mint(caller, amountDscToMint);
    });
  }

  /**
   * Pull `amount` of `asset` from the caller into custody. Requires an allowance
   * for the engine.
   */
  depositCollateral(caller: Address, asset: Address, amount: bigint): void {
    this.execute('depositCollateral', caller, () => this.deposit(caller, asset, amount));
  }

  /**
   * Burn stable tokens, then withdraw collateral, in one transaction
   */
  redeemCollateralForDsc(
    caller: Address,
    asset: Address,
    amountCollateral: bigint,
    amountDscToBurn: bigint
  ): void {
    this.execute('redeemCollateralForDsc', caller, () => {
      requirePositive(amountCollateral);
      requirePositive(amountDscToBurn);
      this.store.getToken(asset);

      this.burnDebt(amountDscToBurn, caller, caller);
      this.redeem(asset, amountCollateral, caller, caller);
      this.health.assertHealthy(caller);
    });
  }

  redeemCollateral(caller: Address, asset: Address, amount: bigint): void {
    this.execute('redeemCollateral', caller, () => {
      requirePositive(amount);
      this.store.getToken(asset);

      this.redeem(asset, amount, caller, caller);
      this.health.assertHealthy(caller);
    });
  }

  mintDsc(caller: Address, amount: bigint): void {
    this.execute('mintDsc', caller, () => this.mint(caller, amount));
  }

  /**
   * Burn the caller's stable tokens against their own debt. Requires an
   * allowance for the engine on the stable token.
   */
  burnDsc(caller: Address, amount: bigint): void {
    this.execute('burnDsc', caller, () => {
      requirePositive(amount);
      this.burnDebt(amount, caller, caller);
      // Burning only raises the health factor; kept as a safeguard
      this.health.assertHealthy(caller);
    });
  }

  /**
   * Cover `debtToCover` of an insolvent `user`'s debt with the caller's stable
   * tokens and receive the equivalent `asset` plus a 10% bonus.
   *
   * The user's health factor must strictly increase. A position whose collateral
   * is worth less than 110% of its debt cannot be improved this way and the
   * call fails; several calls may be needed to bring a user back to solvency.
   */
  liquidate(caller: Address, asset: Address, user: Address, debtToCover: bigint): LiquidationResult {
    return this.execute('liquidate', caller, () => {
      requirePositive(debtToCover);
      this.store.getToken(asset);

      const startingHealthFactor = this.health.healthFactor(user);
      if (isHealthFactorHealthy(startingHealthFactor)) {
        throw createHealthError('HEALTH_FACTOR_OK', { user, healthFactor: startingHealthFactor });
      }

      const tokenAmountFromDebtCovered = this.valuation.assetQuantityFromUsd(asset, debtToCover);
      const bonusCollateral = calculateLiquidationBonus(tokenAmountFromDebtCovered);
      const collateralSeized = tokenAmountFromDebtCovered + bonusCollateral;

      this.redeem(asset, collateralSeized, user, caller);
      this.burnDebt(debtToCover, user, caller);

      const endingHealthFactor = this.health.healthFactor(user);
      if (endingHealthFactor <= startingHealthFactor) {
        throw createHealthError('HEALTH_FACTOR_NOT_IMPROVED', {
          user,
          startingHealthFactor,
          endingHealthFactor,
        });
      }
      this.health.assertHealthy(caller);

      return {
        collateralSeized,
        bonusCollateral,
        debtCovered: debtToCover,
        startingHealthFactor,
        endingHealthFactor,
      };
    });
  }

  // ==========================================================================
  // Events
  // ==========================================================================

  /**
   * Receive committed events in emission order. Returns an unsubscribe function.
   */
  subscribe(listener: EngineListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Committed events, oldest first. Without `maxRetainedEvents` the log grows
   * for the engine's lifetime, and every call copies it.
   */
  getEvents(): readonly EngineEvent[] {
    return [...this.eventLog];
  }

  // ==========================================================================
  // Read-only Queries
  // ==========================================================================

  getUsdValue(asset: Address, amount: bigint): bigint {
    return this.valuation.usdValue(asset, amount);
  }

  getAccountCollateralValue(user: Address): bigint {
    return this.valuation.totalCollateralValue(user);
  }

  getTokenAmountFromUsd(asset: Address, usdAmountInWei: bigint): bigint {
    return this.valuation.assetQuantityFromUsd(asset, usdAmountInWei);
  }

  getHealthFactor(user: Address): bigint {
    return this.health.healthFactor(user);
  }

  getAccountStatus(user: Address): AccountStatus {
    return this.health.status(user);
  }

  calculateHealthFactor(totalDscMinted: bigint, collateralValueInUsd: bigint): bigint {
    return this.health.calculateHealthFactor(totalDscMinted, collateralValueInUsd);
  }

  getAccountInformation(user: Address): AccountInformation {
    return this.valuation.accountInformation(user);
  }

  getAccountSnapshot(user: Address): AccountSnapshot {
    const collateral: Record<Address, bigint> = {};
    for (const asset of this.store.getCollateralTokens()) {
      collateral[asset] = this.store.collateralOf(user, asset);
    }
    const info = this.valuation.accountInformation(user);
    const healthFactor = this.health.calculateHealthFactor(info.totalDscMinted, info.collateralValueInUsd);

    return {
      user,
      collateral,
      ...info,
      healthFactor,
      status: info.totalDscMinted > 0n && !isHealthFactorHealthy(healthFactor) ? 'liquidatable' : 'healthy',
    };
  }

  getCollateralBalanceOfUser(user: Address, asset: Address): bigint {
    return this.store.collateralOf(user, asset);
  }

  getMintedDsc(user: Address): bigint {
    return this.store.debtOf(user);
  }

  getTotalDebt(): bigint {
    return this.store.totalDebt();
  }

  getAccounts(): Address[] {
    return this.store.accounts();
  }

  getCollateralTokens(): readonly Address[] {
    return this.store.getCollateralTokens();
  }

  getCollateralTokenPriceFeed(asset: Address): Address {
    return this.store.getPriceFeed(asset).address;
  }

  getDsc(): StableToken {
    return this.dsc;
  }

  getPrecision(): bigint {
    return PROTOCOL_CONSTANTS.PRECISION;
  }

  getAdditionalFeedPrecision(): bigint {
    return PROTOCOL_CONSTANTS.ADDITIONAL_FEED_PRECISION;
  }

  getLiquidationThreshold(): bigint {
    return PROTOCOL_CONSTANTS.LIQUIDATION_THRESHOLD;
  }

  getLiquidationBonus(): bigint {
    return PROTOCOL_CONSTANTS.LIQUIDATION_BONUS;
  }

  getLiquidationPrecision(): bigint {
    return PROTOCOL_CONSTANTS.LIQUIDATION_PRECISION;
  }

  getMinHealthFactor(): bigint {
    return MIN_HEALTH_FACTOR;
  }

  getMaxPriceAgeSeconds(): number {
    return this.oracle.maxPriceAgeSeconds;
  }

  // ==========================================================================
  // Internal Operations
  // ==========================================================================

  private deposit(caller: Address, asset: Address, amount: bigint): void {
    this.store.recordDeposit(caller, asset, amount);
    this.emit({ type: 'CollateralDeposited', user: caller, asset, amount });

    const success = this.store.getToken(asset).transferFrom(this.address, caller, this.address, amount);
    if (!success) {
      throw createTokenError('TRANSFER_FAILED', { asset, from: caller, amount });
    }
  }

  private mint(caller: Address, amount: bigint): void {
    requirePositive(amount);

    this.store.recordMint(caller, amount);
    this.emit({ type: 'DscMinted', user: caller, amount });

    const minted = this.dsc.mint(this.address, caller, amount);
    if (!minted) {
      throw createTokenError('MINT_FAILED', { to: caller, amount });
    }
    this.health.assertHealthy(caller);
  }

  private redeem(asset: Address, amount: bigint, from: Address, to: Address): void {
    this.store.recordWithdrawal(from, asset, amount);
    this.emit({ type: 'CollateralRedeemed', from, to, asset, amount });

    const success = this.store.getToken(asset).transfer(this.address, to, amount);
    if (!success) {
      throw createTokenError('TRANSFER_FAILED', { asset, to, amount });
    }
  }

  /**
   * Reduce `onBehalfOf`'s debt, paid with `dscFrom`'s tokens
   */
  private burnDebt(amount: bigint, onBehalfOf: Address, dscFrom: Address): void {
    this.store.recordBurn(onBehalfOf, amount);
    this.emit({ type: 'DscBurned', user: onBehalfOf, amount });

    const success = this.dsc.transferFrom(this.address, dscFrom, this.address, amount);
    if (!success) {
      throw createTokenError('TRANSFER_FAILED', { token: 'DSC', from: dscFrom, amount });
    }
    this.dsc.burn(this.address, amount);
  }

  // ==========================================================================
  // Transaction Plumbing
  // ==========================================================================

  private execute<T>(operation: EngineOperation, caller: Address, body: () => T): T {
    const [result, committed] = this.transact(operation, caller, body);

    this.record(committed);
    this.logger.debug(`${operation} committed`, { caller, events: committed.length });
    this.dispatch(committed);
    return result;
  }

  /**
   * Run `body` under the lock and a checkpoint of every ledger. Returns the result
   * with the events it emitted; on failure nothing is kept.
   */
  private transact<T>(operation: EngineOperation, caller: Address, body: () => T): [T, EngineEvent[]] {
    return this.guard.run<[T, EngineEvent[]]>(operation, () => {
      this.pending = [];
      try {
        const result = runAtomically(this.ledgers(), body);
        return [result, this.pending];
      } catch (error) {
        const wrapped = wrapError(error);
        this.logger.warn(`${operation} aborted`, { caller, code: wrapped.code, reason: wrapped.message });
        throw wrapped;
      } finally {
        this.pending = [];
      }
    });
  }

  private record(committed: readonly EngineEvent[]): void {
    this.eventLog.push(...committed);
    const excess = this.maxRetainedEvents === undefined ? 0 : this.eventLog.length - this.maxRetainedEvents;
    if (excess > 0) {
      this.eventLog.splice(0, excess);
    }
  }

  private ledgers(): Checkpointable[] {
    return [this.store, this.dsc, ...this.store.getTokenLedgers()];
  }

  private emit(event: EngineEvent): void {
    this.pending.push(event);
  }

  /**
   * Deliver in commit order. Batches committed by listeners are queued behind
   * the one being delivered and drained by the outermost call.
   */
  private dispatch(events: readonly EngineEvent[]): void {
    this.deliveries.push(...events);
    if (this.dispatching) return;

    this.dispatching = true;
    try {
      let event = this.deliveries.shift();
      while (event !== undefined) {
        this.deliver(event);
        event = this.deliveries.shift();
      }
    } finally {
      this.dispatching = false;
    }
  }

  private deliver(event: EngineEvent): void {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (error) {
        this.logger.error('Event listener failed', wrapError(error), { event: event.type });
      }
    }
  }
}

function requirePositive(amount: bigint): void {
  if (amount <= 0n) {
    throw createAmountError('MUST_BE_MORE_THAN_ZERO', { amount });
  }
}
