export { FeedRegistry, type FeedRegistryOptions, type HealthReport } from "./feed-registry.js";
export { PriceFeed, type PriceFeedOptions } from "./price-feed.js";
export type { FeedEvents, FeedHealth, PriceTick } from "./types.js";
