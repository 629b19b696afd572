export {
  PexelsClient,
  DEFAULT_MAX_IDLE_CONNECTIONS,
  DEFAULT_TIMEOUT_MS,
  type PexelsClientOptions,
  type RequestTarget,
} from './client.js';
export { loadConfig, createClient, type PexelsConfig } from './config.js';
export { PexelsError, isPexelsError, type PexelsErrorKind } from './errors.js';
export { PEXELS_API, PEXELS_VERSION, PEXELS_VIDEO_PATH, PEXELS_COLLECTIONS_PATH } from './endpoints.js';
export {
  Search,
  SearchBuilder,
  Curated,
  CuratedBuilder,
  FetchPhoto,
  FetchPhotoBuilder,
  type SearchParams,
  type PageParams,
} from './builders/photos.js';
export {
  VideoSearch,
  VideoSearchBuilder,
  Popular,
  PopularBuilder,
  FetchVideo,
  FetchVideoBuilder,
  type VideoSearchParams,
  type PopularParams,
} from './builders/videos.js';
export {
  Collections,
  CollectionsBuilder,
  Featured,
  FeaturedBuilder,
  Media,
  MediaBuilder,
  type MediaParams,
} from './builders/collections.js';
export * from './schemas.js';
export * from './types/index.js';
