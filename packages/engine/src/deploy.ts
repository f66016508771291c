// Protocol Bootstrap - wire tokens, feeds, stable token and engine from a network preset

import type { Address, CollateralDeployment, NetworkDeployment, NetworkId } from '@stablecore/types';
import { getNetworkConfig } from '@stablecore/config';
import { StablecoinEngine } from './engine';
import { EngineError } from './errors';
import type { Logger } from './errors';
import { MockV3Aggregator } from './feeds/mock-aggregator';
import type { Clock, PriceFeed } from './oracle';
import { DecentralizedStableCoin, MockErc20 } from './token';
import type { Erc20 } from './token';

/** First anvil account */
export const DEFAULT_DEPLOYER: Address = '0xf39Fd6e51aad88F6F4ce6aB8827279cffFb92266';
export const DEFAULT_DSC_ADDRESS: Address = '0x5FC8d32690cc91D4c39d9d3abcBD16989F875707';
export const DEFAULT_ENGINE_ADDRESS: Address = '0xDc64a140Aa3E981100a9becA4E685f962f0cF6C9';

export interface DeployOptions {
  deployer?: Address;
  dscAddress?: Address;
  engineAddress?: Address;
  maxPriceAgeSeconds?: number;
  maxRetainedEvents?: number;
  clock?: Clock;
  logger?: Logger;
}

export interface CollateralResolver<TToken extends Erc20, TFeed extends PriceFeed> {
  token(collateral: CollateralDeployment): TToken;
  feed(collateral: CollateralDeployment): TFeed;
}

export interface ProtocolDeployment<TToken extends Erc20, TFeed extends PriceFeed> {
  network: NetworkId;
  engine: StablecoinEngine;
  dsc: DecentralizedStableCoin;
  /** Keyed by collateral symbol */
  tokens: Record<string, TToken>;
  feeds: Record<string, TFeed>;
}

export type LocalDeployment = ProtocolDeployment<MockErc20, MockV3Aggregator>;

/**
 * Build the protocol for `deployment`. Stable-token ownership is handed from
 * the deployer to the engine as the last step.
 */
export function deployProtocol<TToken extends Erc20, TFeed extends PriceFeed>(
  deployment: NetworkDeployment,
  resolver: CollateralResolver<TToken, TFeed>,
  options: DeployOptions = {}
): ProtocolDeployment<TToken, TFeed> {
  const deployer = options.deployer ?? DEFAULT_DEPLOYER;

  const tokens: Record<string, TToken> = {};
  const feeds: Record<string, TFeed> = {};
  for (const collateral of deployment.collateral) {
    tokens[collateral.symbol] = resolver.token(collateral);
    feeds[collateral.symbol] = resolver.feed(collateral);
  }

  const dsc = new DecentralizedStableCoin(options.dscAddress ?? DEFAULT_DSC_ADDRESS, deployer);
  const engine = new StablecoinEngine({
    address: options.engineAddress ?? DEFAULT_ENGINE_ADDRESS,
    collateralTokens: deployment.collateral.map((c) => tokens[c.symbol]),
    priceFeeds: deployment.collateral.map((c) => feeds[c.symbol]),
    dsc,
    maxPriceAgeSeconds: options.maxPriceAgeSeconds ?? deployment.oracle.maxPriceAgeSeconds,
    maxRetainedEvents: options.maxRetainedEvents,
    clock: options.clock,
    logger: options.logger,
  });
  dsc.transferOwnership(deployer, engine.address);

  return { network: deployment.network, engine, dsc, tokens, feeds };
}

/**
 * Deploy against in-process mock tokens and feeds (local networks only)
 */
export function deployLocalProtocol(
  network: NetworkId = 'anvil',
  options: DeployOptions = {}
): LocalDeployment {
  const deployment = getNetworkConfig(network);
  if (!deployment.useMocks) {
    throw new EngineError('CONFIGURATION_INVALID', `Network ${network} does not use mock deployments`);
  }

  return deployProtocol(deployment, {
    token: (c) => new MockErc20(c.token, c.symbol, c.decimals),
    feed: (c) => {
      if (c.initialAnswer === undefined) {
        throw new EngineError('CONFIGURATION_INVALID', `No initial price configured for ${c.symbol}`);
      }
      return new MockV3Aggregator(c.priceFeed, 8, c.initialAnswer, options.clock, `${c.symbol} / USD`);
    },
  }, options);
}
