// Sepolia Deployment Configuration
// Collateral tokens and Chainlink-compatible USD feeds on the Sepolia testnet.

import { PROTOCOL_CONSTANTS } from '@stablecore/types';
import type { NetworkDeployment } from '@stablecore/types';

export const SEPOLIA_CONFIG: NetworkDeployment = {
  network: 'sepolia',
  chainId: 11155111,
  useMocks: false,

  collateral: [
    {
      symbol: 'WETH',
      token: '0xdd13E55209Fd76AfE204dBda4007C227904f0a81',
      priceFeed: '0x694AA1769357215DE4FAC081bf1f309aDC325306', // ETH / USD
      decimals: 18,
    },
    {
      symbol: 'WBTC',
      token: '0x8f3Cf7ad23Cd3CaDbD9735AFf958023239c6A063',
      priceFeed: '0x1b44F3514812d835EB1BDB0acB33d3fA3351Ee43', // BTC / USD
      decimals: 18,
    },
  ],

  oracle: {
    maxPriceAgeSeconds: PROTOCOL_CONSTANTS.DEFAULT_MAX_PRICE_AGE_SECONDS,
  },
};
