// Stablecore Protocol Configuration
//
// Network presets and validated engine configuration.
//
// Usage:
// ```typescript
// import { getNetworkConfig, validateEngineConfig } from '@stablecore/config';
//
// const config = getNetworkConfig('anvil');
// ```

export {
  DEFAULT_NETWORK,
  getNetworkConfig,
  getCollateralConfig,
  resolveNetworkId,
  getProtocolConstants,
} from './networks';

export {
  addressSchema,
  networkIdSchema,
  engineConfigSchema,
  validateSchema,
  validateEngineConfig,
  type EngineConfig,
  type EngineConfigInput,
  type ValidationResult,
} from './schema';

export { ANVIL_CONFIG } from './anvil';
export { SEPOLIA_CONFIG } from './sepolia';
