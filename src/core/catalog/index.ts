/**
 * Catalog, metadata and stream lookup.
 *
 * @module core/catalog
 */

export { fanOut, type FanOutTask, type Settled } from './fanout.js';
export {
  CatalogAggregator,
  searchUrl,
  type CatalogAggregatorOptions,
  type CatalogResult,
} from './aggregator.js';
export {
  MetadataResolver,
  groupSeasons,
  metaUrlFor,
  toEpisode,
  type MetadataResolverOptions,
} from './metadata.js';
export {
  StreamAggregator,
  StreamLookup,
  itemIdFor,
  streamUrl,
  type StreamAggregatorOptions,
  type StreamBatch,
  type StreamLookupListener,
  type StreamLookupSnapshot,
  type StreamSource,
} from './streams.js';
export {
  magnetLink,
  normalizeSources,
  parseSearchResponse,
  parseStreamResponse,
} from './schemas.js';
