import type { PexelsClient } from '../client.js';
import { PEXELS_API, PEXELS_VIDEO_PATH, buildUrl } from '../endpoints.js';
import {
  videoResponseSchema,
  videoSchema,
  type Video,
  type VideoResponse,
} from '../schemas.js';
import {
  renderLocale,
  renderOrientation,
  renderSize,
  type Locale,
  type Orientation,
  type Size,
} from '../types/index.js';

const PEXELS_SEARCH_PATH = 'search';
const PEXELS_POPULAR_PATH = 'popular';
const PEXELS_GET_VIDEO_PATH = 'videos';

export interface VideoSearchParams {
  query: string;
  page?: number;
  perPage?: number;
  orientation?: Orientation;
  size?: Size;
  locale?: Locale;
}

/** Video search: `GET /videos/search`. */
export class VideoSearch {
  readonly params: Readonly<VideoSearchParams>;

  constructor(params: VideoSearchParams) {
    this.params = Object.freeze({ ...params });
  }

  static builder(): VideoSearchBuilder {
    return new VideoSearchBuilder();
  }

  createUri(baseUrl: string = PEXELS_API): string {
    const { query, page, perPage, orientation, size, locale } = this.params;
    return buildUrl(baseUrl, [PEXELS_VIDEO_PATH, PEXELS_SEARCH_PATH], [
      ['query', query],
      ['page', page],
      ['per_page', perPage],
      ['orientation', orientation && renderOrientation(orientation)],
      ['size', size && renderSize(size)],
      ['locale', locale && renderLocale(locale)],
    ]);
  }

  async fetch(client: PexelsClient): Promise<VideoResponse> {
    return client.request(this.createUri(client.baseUrl), videoResponseSchema);
  }
}

export class VideoSearchBuilder {
  private params: VideoSearchParams = { query: '' };

  query(query: string): this {
    this.params.query = query;
    return this;
  }

  page(page: number): this {
    this.params.page = page;
    return this;
  }

  perPage(perPage: number): this {
    this.params.perPage = perPage;
    return this;
  }

  orientation(orientation: Orientation): this {
    this.params.orientation = orientation;
    return this;
  }

  /** `large` is 4K, `medium` Full HD, `small` HD. */
  size(size: Size): this {
    this.params.size = size;
    return this;
  }

  locale(locale: Locale): this {
    this.params.locale = locale;
    return this;
  }

  build(): VideoSearch {
    return new VideoSearch(this.params);
  }
}

export interface PopularParams {
  minWidth?: number;
  minHeight?: number;
  /** Seconds. */
  minDuration?: number;
  /** Seconds. */
  maxDuration?: number;
  page?: number;
  perPage?: number;
}

/** Current popular videos: `GET /videos/popular`. */
export class Popular {
  readonly params: Readonly<PopularParams>;

  constructor(params: PopularParams) {
    this.params = Object.freeze({ ...params });
  }

  static builder(): PopularBuilder {
    return new PopularBuilder();
  }

  createUri(baseUrl: string = PEXELS_API): string {
    const { minWidth, minHeight, minDuration, maxDuration, page, perPage } = this.params;
    return buildUrl(baseUrl, [PEXELS_VIDEO_PATH, PEXELS_POPULAR_PATH], [
      ['min_width', minWidth],
      ['min_height', minHeight],
      ['min_duration', minDuration],
      ['max_duration', maxDuration],
      ['page', page],
      ['per_page', perPage],
    ]);
  }

  async fetch(client: PexelsClient): Promise<VideoResponse> {
    return client.request(this.createUri(client.baseUrl), videoResponseSchema);
  }
}

export class PopularBuilder {
  private params: PopularParams = {};

  minWidth(minWidth: number): this {
    this.params.minWidth = minWidth;
    return this;
  }

  minHeight(minHeight: number): this {
    this.params.minHeight = minHeight;
    return this;
  }

  minDuration(minDuration: number): this {
    this.params.minDuration = minDuration;
    return this;
  }

  maxDuration(maxDuration: number): this {
    this.params.maxDuration = maxDuration;
    return this;
  }

  page(page: number): this {
    this.params.page = page;
    return this;
  }

  perPage(perPage: number): this {
    this.params.perPage = perPage;
    return this;
  }

  build(): Popular {
    return new Popular(this.params);
  }
}

/** A single video by id: `GET /videos/videos/{id}`. */
export class FetchVideo {
  constructor(readonly id: number) {}

  static builder(): FetchVideoBuilder {
    return new FetchVideoBuilder();
  }

  createUri(baseUrl: string = PEXELS_API): string {
    return buildUrl(baseUrl, [PEXELS_VIDEO_PATH, PEXELS_GET_VIDEO_PATH, this.id]);
  }

  async fetch(client: PexelsClient): Promise<Video> {
    return client.request(this.createUri(client.baseUrl), videoSchema, {
      resource: 'Video',
      id: String(this.id),
    });
  }
}

export class FetchVideoBuilder {
  private videoId = 0;

  id(id: number): this {
    this.videoId = id;
    return this;
  }

  build(): FetchVideo {
    return new FetchVideo(this.videoId);
  }
}
