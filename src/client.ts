import http from 'http';
import https from 'https';
import axios, { AxiosError, type AxiosAdapter, type AxiosInstance } from 'axios';
import type { z } from 'zod';
import { PEXELS_API } from './endpoints.js';
import { PexelsError } from './errors.js';
import {
  CuratedBuilder,
  FetchPhotoBuilder,
  SearchBuilder,
} from './builders/photos.js';
import {
  FetchVideoBuilder,
  PopularBuilder,
  VideoSearchBuilder,
} from './builders/videos.js';
import {
  CollectionsBuilder,
  FeaturedBuilder,
  MediaBuilder,
} from './builders/collections.js';
import type {
  CollectionsResponse,
  MediaResponse,
  Photo,
  PhotosResponse,
  Video,
  VideoResponse,
} from './schemas.js';

export const DEFAULT_TIMEOUT_MS = 30_000;
export const DEFAULT_MAX_IDLE_CONNECTIONS = 10;

export interface PexelsClientOptions {
  /** Request timeout in milliseconds. */
  timeout?: number;
  /** Idle keep-alive sockets kept open per host. */
  maxIdleConnections?: number;
  baseUrl?: string;
  /** Replaces the axios transport, e.g. with an in-memory one. */
  adapter?: AxiosAdapter;
}

/** What a 404 from a request refers to. */
export interface RequestTarget {
  resource: string;
  id: string;
}

export class PexelsClient {
  readonly baseUrl: string;
  private readonly http: AxiosInstance;

  constructor(private readonly apiKey: string, options: PexelsClientOptions = {}) {
    this.baseUrl = options.baseUrl ?? PEXELS_API;

    const maxFreeSockets = options.maxIdleConnections ?? DEFAULT_MAX_IDLE_CONNECTIONS;
    this.http = axios.create({
      timeout: options.timeout ?? DEFAULT_TIMEOUT_MS,
      httpAgent: new http.Agent({ keepAlive: true, maxFreeSockets }),
      httpsAgent: new https.Agent({ keepAlive: true, maxFreeSockets }),
      headers: {
        Authorization: this.apiKey,
      },
      // Status codes are mapped by `request`, and the body is decoded there too.
      responseType: 'text',
      validateStatus: () => true,
      ...(options.adapter ? { adapter: options.adapter } : {}),
    });
  }

  /**
   * Sends an authenticated GET to `url` and decodes a 200 body with `schema`.
   * `target` names the requested resource for 404s; without it the request
   * path is reported as the identifier.
   */
  async request<S extends z.ZodTypeAny>(url: string, schema: S, target?: RequestTarget): Promise<z.output<S>> {
    let status: number;
    let body: unknown;
    try {
      const response = await this.http.get<unknown>(url);
      status = response.status;
      body = response.data;
    } catch (error) {
      // No response was received: connection failure, DNS, timeout.
      if (error instanceof AxiosError) {
        throw PexelsError.request(error.code ? `${error.code}: ${error.message}` : error.message);
      }
      throw PexelsError.request(error instanceof Error ? error.message : String(error));
    }

    switch (status) {
      case 200:
        return decode(body, schema);
      case 401:
        throw PexelsError.auth();
      case 404: {
        const { resource, id } = target ?? { resource: 'Resource', id: new URL(url).pathname };
        throw PexelsError.notFound(resource, id);
      }
      case 429:
        throw PexelsError.rateLimit();
      default:
        throw PexelsError.api(status);
    }
  }

  async searchPhotos(builder: SearchBuilder): Promise<PhotosResponse> {
    return builder.build().fetch(this);
  }

  async curatedPhotos(builder: CuratedBuilder = new CuratedBuilder()): Promise<PhotosResponse> {
    return builder.build().fetch(this);
  }

  async getPhoto(id: number): Promise<Photo> {
    return new FetchPhotoBuilder().id(id).build().fetch(this);
  }

  async searchVideos(builder: VideoSearchBuilder): Promise<VideoResponse> {
    return builder.build().fetch(this);
  }

  async popularVideos(builder: PopularBuilder = new PopularBuilder()): Promise<VideoResponse> {
    return builder.build().fetch(this);
  }

  async getVideo(id: number): Promise<Video> {
    return new FetchVideoBuilder().id(id).build().fetch(this);
  }

  /** Collections owned by the API key's account. */
  async collections(builder: CollectionsBuilder = new CollectionsBuilder()): Promise<CollectionsResponse> {
    return builder.build().fetch(this);
  }

  async featuredCollections(builder: FeaturedBuilder = new FeaturedBuilder()): Promise<CollectionsResponse> {
    return builder.build().fetch(this);
  }

  async collectionMedia(builder: MediaBuilder): Promise<MediaResponse> {
    return builder.build().fetch(this);
  }
}

function decode<S extends z.ZodTypeAny>(body: unknown, schema: S): z.output<S> {
  let json: unknown = body;
  if (typeof body === 'string') {
    try {
      json = JSON.parse(body);
    } catch (error) {
      throw PexelsError.jsonParse(error instanceof Error ? error.message : String(error));
    }
  }

  const result = schema.safeParse(json);
  if (!result.success) {
    const issue = result.error.issues[0];
    const path = issue.path.length > 0 ? issue.path.join('.') : '<root>';
    throw PexelsError.jsonParse(`${path}: ${issue.message}`);
  }
  return result.data;
}
