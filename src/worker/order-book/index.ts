export {
  STREAM_BACKOFF_CONFIG,
  createOrderBookAggregator,
  type AggregatorConfig,
  type AggregatorDeps,
  type OrderBookAggregator,
  type VenueFeedStatus,
} from "./aggregator";
