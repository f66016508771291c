// Local (anvil) Deployment Configuration
// Feeds and tokens are deployed as in-process mocks by the bootstrap.

import { PROTOCOL_CONSTANTS } from '@stablecore/types';
import type { NetworkDeployment } from '@stablecore/types';

export const ANVIL_CONFIG: NetworkDeployment = {
  network: 'anvil',
  chainId: 31337,
  useMocks: true,

  collateral: [
    {
      symbol: 'WETH',
      token: '0x5FbDB2315678afecb367f032d93F642f64180aa3',
      priceFeed: '0xe7f1725E7734CE288F8367e1Bb143E90bb3F0512',
      decimals: 18,
      initialAnswer: 2_000_00000000n, // $2000
    },
    {
      symbol: 'WBTC',
      token: '0x9fE46736679d2D9a65F0992F2272dE9f3c7fa6e0',
      priceFeed: '0xCf7Ed3AccA5a467e9e704C703E8D87F634fB0Fc9',
      decimals: 18,
      initialAnswer: 1_000_00000000n, // $1000
    },
  ],

  oracle: {
    maxPriceAgeSeconds: PROTOCOL_CONSTANTS.DEFAULT_MAX_PRICE_AGE_SECONDS,
  },
};
