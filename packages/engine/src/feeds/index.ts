export { MockV3Aggregator } from './mock-aggregator';
export { HttpPriceFeed, type HttpPriceFeedConfig } from './http-price-feed';
