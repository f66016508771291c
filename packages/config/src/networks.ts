// Network Configuration for the Stablecore protocol

import { PROTOCOL_CONSTANTS } from '@stablecore/types';
import type { CollateralDeployment, NetworkDeployment, NetworkId } from '@stablecore/types';
import { ANVIL_CONFIG } from './anvil';
import { SEPOLIA_CONFIG } from './sepolia';
import { networkIdSchema } from './schema';

const NETWORK_CONFIGS: Record<NetworkId, NetworkDeployment> = {
  anvil: ANVIL_CONFIG,
  sepolia: SEPOLIA_CONFIG,
};

export const DEFAULT_NETWORK: NetworkId = 'anvil';

export function getNetworkConfig(network: NetworkId): NetworkDeployment {
  const config = NETWORK_CONFIGS[network];
  if (!config) {
    throw new Error(`Unknown network: ${network}`);
  }
  return config;
}

export function getCollateralConfig(network: NetworkId, symbol: string): CollateralDeployment {
  const entry = getNetworkConfig(network).collateral.find(
    (c) => c.symbol.toLowerCase() === symbol.toLowerCase()
  );
  if (!entry) {
    throw new Error(`Collateral ${symbol} is not configured on ${network}`);
  }
  return entry;
}

/**
 * Resolve the active network from the environment (`STABLECORE_NETWORK`)
 */
export function resolveNetworkId(env: Record<string, string | undefined> = process.env): NetworkId {
  const raw = env.STABLECORE_NETWORK;
  if (raw === undefined || raw === '') return DEFAULT_NETWORK;

  const parsed = networkIdSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`Unknown network: ${raw}`);
  }
  return parsed.data;
}

export function getProtocolConstants() {
  return PROTOCOL_CONSTANTS;
}
