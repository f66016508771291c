// Token Ledgers - in-process ERC-20 balances for collateral and the stable token

import { ZERO_ADDRESS, MAX_UINT256 } from '@stablecore/types';
import type { Address } from '@stablecore/types';
import { createAmountError, createTokenError } from './errors';
import { cloneNested } from './transaction';
import type { Checkpointable, Restore } from './transaction';

// ============================================================================
// Interfaces
// ============================================================================

/**
 * Fungible token ledger. Callers are explicit: there is no ambient sender.
 * Transfers return `false` or throw when they do not go through.
 */
export interface Erc20 extends Checkpointable {
  readonly address: Address;
  readonly symbol: string;
  readonly decimals: number;
  totalSupply(): bigint;
  balanceOf(account: Address): bigint;
  allowance(owner: Address, spender: Address): bigint;
  approve(owner: Address, spender: Address, amount: bigint): boolean;
  transfer(from: Address, to: Address, amount: bigint): boolean;
  transferFrom(spender: Address, from: Address, to: Address, amount: bigint): boolean;
}

/** Stable token whose supply only its owner (the engine) may change */
export interface StableToken extends Erc20 {
  owner(): Address;
  mint(caller: Address, to: Address, amount: bigint): boolean;
  /** Burns from the caller's own balance */
  burn(caller: Address, amount: bigint): void;
}

// ============================================================================
// Ownable
// ============================================================================

export class Ownable implements Checkpointable {
  private currentOwner: Address;

  constructor(initialOwner: Address) {
    if (initialOwner === ZERO_ADDRESS) {
      throw createTokenError('ZERO_ADDRESS', { role: 'owner' });
    }
    this.currentOwner = initialOwner;
  }

  owner(): Address {
    return this.currentOwner;
  }

  requireOwner(caller: Address): void {
    if (caller !== this.currentOwner) {
      throw createTokenError('UNAUTHORIZED', { caller, owner: this.currentOwner });
    }
  }

  transferOwnership(caller: Address, newOwner: Address): void {
    this.requireOwner(caller);
    if (newOwner === ZERO_ADDRESS) {
      throw createTokenError('ZERO_ADDRESS', { role: 'owner' });
    }
    this.currentOwner = newOwner;
  }

  checkpoint(): Restore {
    const saved = this.currentOwner;
    return () => {
      this.currentOwner = saved;
    };
  }
}

// ============================================================================
// ERC-20
// ============================================================================

export class Erc20Token implements Erc20 {
  private balances = new Map<Address, bigint>();
  private allowances = new Map<Address, Map<Address, bigint>>();
  private supply = 0n;

  constructor(
    readonly address: Address,
    readonly symbol: string,
    readonly decimals = 18
  ) {}

  totalSupply(): bigint {
    return this.supply;
  }

  balanceOf(account: Address): bigint {
    return this.balances.get(account) ?? 0n;
  }

  allowance(owner: Address, spender: Address): bigint {
    return this.allowances.get(owner)?.get(spender) ?? 0n;
  }

  approve(owner: Address, spender: Address, amount: bigint): boolean {
    if (spender === ZERO_ADDRESS) {
      throw createTokenError('ZERO_ADDRESS', { role: 'spender' });
    }
    requireNonNegative(amount);
    let granted = this.allowances.get(owner);
    if (!granted) {
      granted = new Map();
      this.allowances.set(owner, granted);
    }
    granted.set(spender, amount);
    return true;
  }

  transfer(from: Address, to: Address, amount: bigint): boolean {
    this.move(from, to, amount);
    return true;
  }

  transferFrom(spender: Address, from: Address, to: Address, amount: bigint): boolean {
    requireNonNegative(amount);
    const allowed = this.allowance(from, spender);
    if (allowed < amount) {
      throw createTokenError('INSUFFICIENT_ALLOWANCE', {
        token: this.symbol,
        owner: from,
        spender,
        allowed,
        requested: amount,
      });
    }

    // An allowance of MAX_UINT256 never decreases
    if (allowed !== MAX_UINT256) {
      this.approve(from, spender, allowed - amount);
    }
    this.move(from, to, amount);
    return true;
  }

  checkpoint(): Restore {
    const balances = new Map(this.balances);
    const allowances = cloneNested(this.allowances);
    const supply = this.supply;

    return () => {
      this.balances = balances;
      this.allowances = allowances;
      this.supply = supply;
    };
  }

  protected mintTo(to: Address, amount: bigint): void {
    if (to === ZERO_ADDRESS) {
      throw createTokenError('ZERO_ADDRESS', { role: 'recipient' });
    }
    requireNonNegative(amount);
    this.balances.set(to, this.balanceOf(to) + amount);
    this.supply += amount;
  }

  protected burnFrom(from: Address, amount: bigint): void {
    requireNonNegative(amount);
    const balance = this.balanceOf(from);
    if (balance < amount) {
      throw createTokenError('INSUFFICIENT_BALANCE', {
        token: this.symbol,
        available: balance,
        requested: amount,
      });
    }
    this.balances.set(from, balance - amount);
    this.supply -= amount;
  }

  private move(from: Address, to: Address, amount: bigint): void {
    if (to === ZERO_ADDRESS) {
      throw createTokenError('ZERO_ADDRESS', { role: 'recipient' });
    }
    requireNonNegative(amount);
    const balance = this.balanceOf(from);
    if (balance < amount) {
      throw createTokenError('INSUFFICIENT_BALANCE', {
        token: this.symbol,
        available: balance,
        requested: amount,
      });
    }
    this.balances.set(from, balance - amount);
    this.balances.set(to, this.balanceOf(to) + amount);
  }
}

function requireNonNegative(amount: bigint): void {
  if (amount < 0n) {
    throw createAmountError('NEGATIVE_AMOUNT', { amount });
  }
}

/**
 * Collateral token with an open faucet, for local networks and tests
 */
export class MockErc20 extends Erc20Token {
  mint(to: Address, amount: bigint): void {
    this.mintTo(to, amount);
  }
}

// ============================================================================
// Stable Token
// ============================================================================

/**
 * The USD-pegged token. Mint and burn are restricted to the owner, which the
 * bootstrap sets to the engine.
 */
export class DecentralizedStableCoin extends Erc20Token implements StableToken {
  private readonly ownership: Ownable;

  constructor(address: Address, initialOwner: Address) {
    super(address, 'DSC', 18);
    this.ownership = new Ownable(initialOwner);
  }

  owner(): Address {
    return this.ownership.owner();
  }

  transferOwnership(caller: Address, newOwner: Address): void {
    this.ownership.transferOwnership(caller, newOwner);
  }

  mint(caller: Address, to: Address, amount: bigint): boolean {
    this.ownership.requireOwner(caller);
    if (to === ZERO_ADDRESS) {
      throw createTokenError('ZERO_ADDRESS', { role: 'recipient' });
    }
    if (amount <= 0n) {
      throw createAmountError('MUST_BE_MORE_THAN_ZERO', { amount });
    }
    this.mintTo(to, amount);
    return true;
  }

  burn(caller: Address, amount: bigint): void {
    this.ownership.requireOwner(caller);
    if (amount <= 0n) {
      throw createAmountError('MUST_BE_MORE_THAN_ZERO', { amount });
    }
    this.burnFrom(caller, amount);
  }

  checkpoint(): Restore {
    const restoreLedger = super.checkpoint();
    const restoreOwner = this.ownership.checkpoint();
    return () => {
      restoreLedger();
      restoreOwner();
    };
  }
}
