// Stablecore Engine - Main exports

export { StablecoinEngine, type StablecoinEngineConfig, type EngineListener } from './engine';
export { AccountingStore } from './store';
export { ValuationEngine } from './valuation';
export { HealthFactorEngine } from './health';
export { PriceOracle, systemClock, type PriceFeed, type Clock, type OracleOptions } from './oracle';
export {
  Ownable,
  Erc20Token,
  MockErc20,
  DecentralizedStableCoin,
  type Erc20,
  type StableToken,
} from './token';
export {
  ReentrancyGuard,
  runAtomically,
  type Checkpointable,
  type Restore,
  type LockToken,
} from './transaction';
export {
  deployProtocol,
  deployLocalProtocol,
  DEFAULT_DEPLOYER,
  DEFAULT_DSC_ADDRESS,
  DEFAULT_ENGINE_ADDRESS,
  type DeployOptions,
  type CollateralResolver,
  type ProtocolDeployment,
  type LocalDeployment,
} from './deploy';

// Feeds
export { MockV3Aggregator, HttpPriceFeed, type HttpPriceFeedConfig } from './feeds';

// Errors & logging
export {
  EngineError,
  isEngineError,
  wrapError,
  createAmountError,
  createHealthError,
  createTokenError,
  createOracleError,
  createNetworkError,
  createLogger,
  resolveLogLevel,
  type EngineErrorCode,
  type EngineErrorDetails,
  type Logger,
  type LoggerOptions,
  type LogLevel,
} from './errors';

// Re-export types for convenience
export * from '@stablecore/types';
