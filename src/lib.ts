// Library entry point: the resolver pipeline and the now-playing sync loop without the CLI.
export { BpmResolver, type ResolverStatus, type ResolverTiers } from './services/BpmResolver.js';
export { createBpmCache, createBpmResolver, type ResolverOverrides } from './services/createResolver.js';
export { TrackSyncService } from './services/TrackSyncService.js';
export { buildConfig, loadConfig, type PipelineConfig, type ResolvedConfig } from './utils/config.js';
export { extractBpm, isPlausibleBpm } from './modules/extractors/BpmExtractor.js';
export { normalize } from './utils/normalize.js';
export { ConfigError, InvalidTrackQueryError } from './types/errors.js';
export type {
  BpmConsumer,
  BpmRecord,
  BpmSource,
  IBpmCache,
  NowPlayingTrack,
  ResolutionResult,
  TrackQuery,
  TrackQueryProducer,
} from './types/index.js';
