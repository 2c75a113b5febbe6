export {
  RenderCache,
  DEFAULT_MAX_BYTES,
  DEFAULT_MAX_ENTRIES,
  DEFAULT_TTL_MS,
  DEFAULT_RENDER_TIMEOUT_MS,
  DEFAULT_RETRY,
} from './render-cache.js';
export type {
  RenderFn,
  RenderSource,
  RenderOutcome,
  RetryPolicy,
  RenderCacheEvent,
  RenderCacheOptions,
  RenderCacheStats,
  ResolveOptions,
} from './render-cache.js';
