export {
  resolvePermalink,
  toOutputPath,
  outputExtension,
  PAGE_PERMALINK,
  COLLECTION_PERMALINK,
  type PermalinkItem,
} from "./permalink";
export {
  CollectionAggregator,
  type CollectionAggregatorOptions,
  type UnknownCollectionPolicy,
} from "./collection-aggregator";
export type {
  AggregationResult,
  Collection,
  DroppedItem,
  ItemSummary,
  ResolvedItem,
} from "./types";
