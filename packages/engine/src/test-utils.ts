// Shared fixtures for engine tests

import type { Address } from '@stablecore/types';
import { deployLocalProtocol } from './deploy';
import type { DeployOptions, LocalDeployment } from './deploy';
import { EngineError } from './errors';
import type { EngineErrorCode } from './errors';

export const ONE = 10n ** 18n;

export function address(suffix: string): Address {
  return `0x${suffix.padStart(40, '0')}`;
}

export const USER = address('a11ce');
export const LIQUIDATOR = address('b0b');
export const OTHER = address('ca501');

/**
 * Run `fn` and return the EngineError it throws. Fails the test otherwise.
 */
export function captureError(fn: () => unknown): EngineError {
  try {
    fn();
  } catch (error) {
    if (error instanceof EngineError) return error;
    throw error;
  }
  throw new Error('Expected an EngineError to be thrown');
}

export function expectCode(fn: () => unknown, code: EngineErrorCode): EngineError {
  const error = captureError(fn);
  if (error.code !== code) {
    throw new Error(`Expected ${code} but got ${error.code}: ${error.message}`);
  }
  return error;
}

export interface Fixture extends LocalDeployment {
  weth: Address;
  wbtc: Address;
  /** Mint collateral to `user` and approve the engine for it */
  fund(user: Address, symbol: 'WETH' | 'WBTC', amount: bigint): void;
  /** Approve the engine to pull `amount` stable tokens from `user` */
  approveDsc(user: Address, amount: bigint): void;
  /** Set the mock USD price of a collateral (whole dollars) */
  setPrice(symbol: 'WETH' | 'WBTC', usd: bigint): void;
}

export function createFixture(options: DeployOptions = {}): Fixture {
  const deployment = deployLocalProtocol('anvil', options);
  const { engine, dsc, tokens, feeds } = deployment;

  return {
    ...deployment,
    weth: tokens.WETH.address,
    wbtc: tokens.WBTC.address,
    fund(user, symbol, amount) {
      tokens[symbol].mint(user, amount);
      tokens[symbol].approve(user, engine.address, amount);
    },
    approveDsc(user, amount) {
      dsc.approve(user, engine.address, amount);
    },
    setPrice(symbol, usd) {
      feeds[symbol].updateAnswer(usd * 100_000_000n);
    },
  };
}
