// Stablecore Core Types

// ============================================================================
// Protocol Constants
// ============================================================================

export const PROTOCOL_CONSTANTS = {
  PRECISION: 1_000_000_000_000_000_000n, // 1e18 fixed-point unit
  ADDITIONAL_FEED_PRECISION: 10_000_000_000n, // 1e10, lifts 8-decimal prices to 18
  LIQUIDATION_THRESHOLD: 50n, // 50% of collateral value backs debt (200% ratio)
  LIQUIDATION_PRECISION: 100n,
  LIQUIDATION_BONUS: 10n, // 10% bonus for liquidators
  MIN_HEALTH_FACTOR: 1_000_000_000_000_000_000n, // 1.0
  MAX_UINT256: 2n ** 256n - 1n,
  FEED_DECIMALS: 8,
  DECIMALS: 18,
  DEFAULT_MAX_PRICE_AGE_SECONDS: 3 * 60 * 60,
} as const;

// Individual exports for convenience
export const PRECISION = PROTOCOL_CONSTANTS.PRECISION;
export const MIN_HEALTH_FACTOR = PROTOCOL_CONSTANTS.MIN_HEALTH_FACTOR;
export const MAX_UINT256 = PROTOCOL_CONSTANTS.MAX_UINT256;
export const DECIMALS = PROTOCOL_CONSTANTS.DECIMALS;

// ============================================================================
// Identity Types
// ============================================================================

/** 20-byte hex account or contract identifier */
export type Address = `0x${string}`;

export const ZERO_ADDRESS: Address = '0x0000000000000000000000000000000000000000';

// ============================================================================
// Account Types
// ============================================================================

export interface AccountInformation {
  totalDscMinted: bigint; // stable-token units (18 decimals)
  collateralValueInUsd: bigint; // USD (18 decimals)
}

export type AccountStatus = 'healthy' | 'liquidatable';

export interface AccountSnapshot extends AccountInformation {
  user: Address;
  collateral: Record<Address, bigint>;
  healthFactor: bigint;
  status: AccountStatus;
}

// ============================================================================
// Oracle Types
// ============================================================================

/** One aggregator round. `answer` is signed and carries 8 decimals. */
export interface RoundData {
  roundId: bigint;
  answer: bigint;
  startedAt: number; // unix seconds
  updatedAt: number; // unix seconds
  answeredInRound: bigint;
}

// ============================================================================
// Event Types
// ============================================================================

export interface CollateralDepositedEvent {
  type: 'CollateralDeposited';
  user: Address;
  asset: Address;
  amount: bigint;
}

export interface CollateralRedeemedEvent {
  type: 'CollateralRedeemed';
  from: Address;
  to: Address;
  asset: Address;
  amount: bigint;
}

export interface DscMintedEvent {
  type: 'DscMinted';
  user: Address;
  amount: bigint;
}

export interface DscBurnedEvent {
  type: 'DscBurned';
  user: Address;
  amount: bigint;
}

export type EngineEvent =
  | CollateralDepositedEvent
  | CollateralRedeemedEvent
  | DscMintedEvent
  | DscBurnedEvent;

// ============================================================================
// Operation Types
// ============================================================================

export type EngineOperation =
  | 'depositCollateral'
  | 'mintDsc'
  | 'redeemCollateral'
  | 'burnDsc'
  | 'depositCollateralAndMintDsc'
  | 'redeemCollateralForDsc'
  | 'liquidate';

export interface LiquidationResult {
  collateralSeized: bigint; // asset units, bonus included
  bonusCollateral: bigint;
  debtCovered: bigint;
  startingHealthFactor: bigint;
  endingHealthFactor: bigint;
}

// ============================================================================
// Network Types
// ============================================================================

export type NetworkId = 'anvil' | 'sepolia';

export interface CollateralDeployment {
  symbol: string;
  token: Address;
  priceFeed: Address;
  decimals: number;
  /** Starting answer for locally deployed mock feeds (8 decimals) */
  initialAnswer?: bigint;
}

export interface NetworkDeployment {
  network: NetworkId;
  chainId: number;
  collateral: CollateralDeployment[];
  oracle: {
    maxPriceAgeSeconds: number;
  };
  /** Local networks deploy mock feeds and tokens instead of using the addresses above */
  useMocks: boolean;
}
