import type { PexelsClient } from '../client.js';
import { PEXELS_API, PEXELS_VERSION, buildUrl } from '../endpoints.js';
import {
  photoSchema,
  photosResponseSchema,
  type Photo,
  type PhotosResponse,
} from '../schemas.js';
import {
  parseColor,
  renderColor,
  renderLocale,
  renderOrientation,
  renderSize,
  type Color,
  type Locale,
  type Orientation,
  type Size,
} from '../types/index.js';

const PEXELS_SEARCH_PATH = 'search';
const PEXELS_CURATED_PATH = 'curated';
const PEXELS_GET_PHOTO_PATH = 'photos';

export interface SearchParams {
  query: string;
  page?: number;
  perPage?: number;
  orientation?: Orientation;
  size?: Size;
  color?: Color;
  locale?: Locale;
}

/** Photo search: `GET /v1/search`. */
export class Search {
  readonly params: Readonly<SearchParams>;

  constructor(params: SearchParams) {
    this.params = Object.freeze({ ...params });
  }

  static builder(): SearchBuilder {
    return new SearchBuilder();
  }

  createUri(baseUrl: string = PEXELS_API): string {
    const { query, page, perPage, orientation, size, color, locale } = this.params;
    return buildUrl(baseUrl, [PEXELS_VERSION, PEXELS_SEARCH_PATH], [
      ['query', query],
      ['page', page],
      ['per_page', perPage],
      ['orientation', orientation && renderOrientation(orientation)],
      ['size', size && renderSize(size)],
      ['color', color && renderColor(color)],
      ['locale', locale && renderLocale(locale)],
    ]);
  }

  async fetch(client: PexelsClient): Promise<PhotosResponse> {
    return client.request(this.createUri(client.baseUrl), photosResponseSchema);
  }
}

export class SearchBuilder {
  private params: SearchParams = { query: '' };

  /** The search query, e.g. `Ocean`, `Tigers`, `Group of people working`. */
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

  size(size: Size): this {
    this.params.size = size;
    return this;
  }

  /**
   * A named colour (`red`, `turquoise`, ...) or a hex code such as `#ffffff`.
   * Throws a `hex_color_code` error for anything else.
   */
  color(color: string): this {
    this.params.color = parseColor(color);
    return this;
  }

  locale(locale: Locale): this {
    this.params.locale = locale;
    return this;
  }

  build(): Search {
    return new Search(this.params);
  }
}

export interface PageParams {
  page?: number;
  perPage?: number;
}

/** Curated photos, refreshed hourly by the Pexels team: `GET /v1/curated`. */
export class Curated {
  readonly params: Readonly<PageParams>;

  constructor(params: PageParams) {
    this.params = Object.freeze({ ...params });
  }

  static builder(): CuratedBuilder {
    return new CuratedBuilder();
  }

  createUri(baseUrl: string = PEXELS_API): string {
    return buildUrl(baseUrl, [PEXELS_VERSION, PEXELS_CURATED_PATH], [
      ['page', this.params.page],
      ['per_page', this.params.perPage],
    ]);
  }

  async fetch(client: PexelsClient): Promise<PhotosResponse> {
    return client.request(this.createUri(client.baseUrl), photosResponseSchema);
  }
}

export class CuratedBuilder {
  private params: PageParams = {};

  page(page: number): this {
    this.params.page = page;
    return this;
  }

  perPage(perPage: number): this {
    this.params.perPage = perPage;
    return this;
  }

  build(): Curated {
    return new Curated(this.params);
  }
}

/** A single photo by id: `GET /v1/photos/{id}`. */
export class FetchPhoto {
  constructor(readonly id: number) {}

  static builder(): FetchPhotoBuilder {
    return new FetchPhotoBuilder();
  }

  createUri(baseUrl: string = PEXELS_API): string {
    return buildUrl(baseUrl, [PEXELS_VERSION, PEXELS_GET_PHOTO_PATH, this.id]);
  }

  async fetch(client: PexelsClient): Promise<Photo> {
    return client.request(this.createUri(client.baseUrl), photoSchema, {
      resource: 'Photo',
      id: String(this.id),
    });
  }
}

export class FetchPhotoBuilder {
  private photoId = 0;

  id(id: number): this {
    this.photoId = id;
    return this;
  }

  build(): FetchPhoto {
    return new FetchPhoto(this.photoId);
  }
}
