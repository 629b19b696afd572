import type { PexelsClient } from '../client.js';
import { PEXELS_API, PEXELS_COLLECTIONS_PATH, PEXELS_VERSION, buildUrl } from '../endpoints.js';
import {
  collectionsResponseSchema,
  mediaResponseSchema,
  type CollectionsResponse,
  type MediaResponse,
} from '../schemas.js';
import {
  renderMediaSort,
  renderMediaType,
  type MediaSort,
  type MediaType,
} from '../types/index.js';
import type { PageParams } from './photos.js';

const PEXELS_FEATURED_PATH = 'featured';

/** Collections of the authenticated account: `GET /v1/collections`. */
export class Collections {
  readonly params: Readonly<PageParams>;

  constructor(params: PageParams) {
    this.params = Object.freeze({ ...params });
  }

  static builder(): CollectionsBuilder {
    return new CollectionsBuilder();
  }

  createUri(baseUrl: string = PEXELS_API): string {
    return buildUrl(baseUrl, [PEXELS_VERSION, PEXELS_COLLECTIONS_PATH], [
      ['page', this.params.page],
      ['per_page', this.params.perPage],
    ]);
  }

  async fetch(client: PexelsClient): Promise<CollectionsResponse> {
    return client.request(this.createUri(client.baseUrl), collectionsResponseSchema);
  }
}

export class CollectionsBuilder {
  private params: PageParams = {};

  page(page: number): this {
    this.params.page = page;
    return this;
  }

  perPage(perPage: number): this {
    this.params.perPage = perPage;
    return this;
  }

  build(): Collections {
    return new Collections(this.params);
  }
}

/** Collections featured by Pexels: `GET /v1/collections/featured`. */
export class Featured {
  readonly params: Readonly<PageParams>;

  constructor(params: PageParams) {
    this.params = Object.freeze({ ...params });
  }

  static builder(): FeaturedBuilder {
    return new FeaturedBuilder();
  }

  createUri(baseUrl: string = PEXELS_API): string {
    return buildUrl(baseUrl, [PEXELS_VERSION, PEXELS_COLLECTIONS_PATH, PEXELS_FEATURED_PATH], [
      ['page', this.params.page],
      ['per_page', this.params.perPage],
    ]);
  }

  async fetch(client: PexelsClient): Promise<CollectionsResponse> {
    return client.request(this.createUri(client.baseUrl), collectionsResponseSchema);
  }
}

export class FeaturedBuilder {
  private params: PageParams = {};

  page(page: number): this {
    this.params.page = page;
    return this;
  }

  perPage(perPage: number): this {
    this.params.perPage = perPage;
    return this;
  }

  build(): Featured {
    return new Featured(this.params);
  }
}

export interface MediaParams extends PageParams {
  id: string;
  type?: MediaType;
  sort?: MediaSort;
}

/**
 * Photos and videos inside one collection: `GET /v1/collections/{id}`.
 * A `type` of `all` is the same as leaving it unset.
 */
export class Media {
  readonly params: Readonly<MediaParams>;

  constructor(params: MediaParams) {
    this.params = Object.freeze({ ...params });
  }

  static builder(): MediaBuilder {
    return new MediaBuilder();
  }

  createUri(baseUrl: string = PEXELS_API): string {
    const { id, type, sort, page, perPage } = this.params;
    return buildUrl(baseUrl, [PEXELS_VERSION, PEXELS_COLLECTIONS_PATH, id], [
      ['type', type && renderMediaType(type)],
      ['sort', sort && renderMediaSort(sort)],
      ['page', page],
      ['per_page', perPage],
    ]);
  }

  async fetch(client: PexelsClient): Promise<MediaResponse> {
    return client.request(this.createUri(client.baseUrl), mediaResponseSchema, {
      resource: 'Collection',
      id: this.params.id,
    });
  }
}

export class MediaBuilder {
  private params: MediaParams = { id: '' };

  id(id: string): this {
    this.params.id = id;
    return this;
  }

  type(type: MediaType): this {
    this.params.type = type;
    return this;
  }

  sort(sort: MediaSort): this {
    this.params.sort = sort;
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

  build(): Media {
    return new Media(this.params);
  }
}
