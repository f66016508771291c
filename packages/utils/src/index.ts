// Stablecore Utility Functions

import { MAX_UINT256, PROTOCOL_CONSTANTS } from '@stablecore/types';
import type { Address } from '@stablecore/types';

const {
  PRECISION,
  ADDITIONAL_FEED_PRECISION,
  LIQUIDATION_THRESHOLD,
  LIQUIDATION_PRECISION,
  LIQUIDATION_BONUS,
  MIN_HEALTH_FACTOR,
} = PROTOCOL_CONSTANTS;

// ============================================================================
// Formatting
// ============================================================================

/**
 * Format a fixed-point integer as a decimal string, trimming trailing zeros
 */
export function formatUnits(value: bigint, decimals: number = PROTOCOL_CONSTANTS.DECIMALS): string {
  const negative = value < 0n;
  const abs = negative ? -value : value;
  const base = 10n ** BigInt(decimals);
  const whole = abs / base;
  const fraction = (abs % base).toString().padStart(decimals, '0').replace(/0+$/, '');
  const body = fraction.length > 0 ? `${whole}.${fraction}` : whole.toString();
  return negative ? `-${body}` : body;
}

/**
 * Parse a decimal string into a fixed-point integer.
 * Digits beyond `decimals` are truncated.
 */
export function parseUnits(value: string, decimals: number = PROTOCOL_CONSTANTS.DECIMALS): bigint {
  const trimmed = value.trim();
  if (!/^-?\d+(\.\d+)?$/.test(trimmed)) {
    throw new Error(`Invalid decimal string: "${value}"`);
  }

  const negative = trimmed.startsWith('-');
  const [whole, fraction = ''] = (negative ? trimmed.slice(1) : trimmed).split('.');
  const padded = fraction.slice(0, decimals).padEnd(decimals, '0');
  const result = BigInt(whole) * 10n ** BigInt(decimals) + BigInt(padded === '' ? '0' : padded);
  return negative ? -result : result;
}

/**
 * Format an 18-decimal USD amount as currency
 */
export function formatUsd(amount: bigint, decimals = 2): string {
  return new Intl.NumberFormat('en-US', {
    style: 'currency',
    currency: 'USD',
    minimumFractionDigits: decimals,
    maximumFractionDigits: decimals,
  }).format(Number(formatUnits(amount)));
}

/**
 * Format a health factor; zero-debt accounts render as infinity
 */
export function formatHealthFactor(healthFactor: bigint, decimals = 2): string {
  if (healthFactor === MAX_UINT256) return '∞';
  return Number(formatUnits(healthFactor)).toFixed(decimals);
}

/**
 * Truncate address for display
 */
export function truncateAddress(address: string, chars = 6): string {
  if (address.length <= chars * 2 + 3) return address;
  return `${address.slice(0, chars)}...${address.slice(-chars)}`;
}

// ============================================================================
// Calculations
// ============================================================================

/**
 * USD value (18 decimals) of `quantity` at an 8-decimal price.
 * A non-positive price values the collateral at zero.
 */
export function calculateUsdValue(price: bigint, quantity: bigint): bigint {
  if (price <= 0n) return 0n;
  return (price * ADDITIONAL_FEED_PRECISION * quantity) / PRECISION;
}

/**
 * Asset quantity worth `usdAmount` at an 8-decimal price. Caller guarantees price > 0.
 */
export function calculateTokenAmountFromUsd(price: bigint, usdAmount: bigint): bigint {
  return (usdAmount * PRECISION) / (price * ADDITIONAL_FEED_PRECISION);
}

/**
 * Health factor (18 decimals) for a debt and raw collateral value.
 * Zero debt is unconditionally solvent.
 */
export function calculateHealthFactor(totalDscMinted: bigint, collateralValueInUsd: bigint): bigint {
  if (totalDscMinted === 0n) return MAX_UINT256;

  const collateralAdjustedForThreshold =
    (collateralValueInUsd * LIQUIDATION_THRESHOLD) / LIQUIDATION_PRECISION;

  return (collateralAdjustedForThreshold * PRECISION) / totalDscMinted;
}

/**
 * Bonus collateral awarded on top of a seized quantity
 */
export function calculateLiquidationBonus(quantity: bigint): bigint {
  return (quantity * LIQUIDATION_BONUS) / LIQUIDATION_PRECISION;
}

/**
 * Check if a health factor is at or above the minimum
 */
export function isHealthFactorHealthy(healthFactor: bigint): boolean {
  return healthFactor >= MIN_HEALTH_FACTOR;
}

// ============================================================================
// Validation
// ============================================================================

/**
 * Validate hex string
 */
export function isValidHex(str: string): boolean {
  return /^[0-9a-fA-F]+$/.test(str);
}

/**
 * Validate a 0x-prefixed 20-byte address
 */
export function isValidAddress(value: string): value is Address {
  return value.length === 42 && value.startsWith('0x') && isValidHex(value.slice(2));
}
