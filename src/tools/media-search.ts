import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import type { PexelsClient } from '../client.js';
import { CuratedBuilder, SearchBuilder } from '../builders/photos.js';
import { PopularBuilder, VideoSearchBuilder } from '../builders/videos.js';
import type { Photo, PhotosResponse, Video, VideoResponse } from '../schemas.js';
import { LOCALES, ORIENTATIONS, SIZES } from '../types/index.js';

const pageArgs = {
  page: z.number().int().min(1).optional(),
  per_page: z.number().int().min(1).max(80).optional(),
};

export const searchPhotosArgsSchema = z.object({
  query: z.string().trim().min(1, { message: 'Please provide a search query.' }),
  ...pageArgs,
  orientation: z.enum(ORIENTATIONS).optional(),
  size: z.enum(SIZES).optional(),
  color: z.string().optional(),
  locale: z.enum(LOCALES).optional(),
});

export const searchVideosArgsSchema = searchPhotosArgsSchema.omit({ color: true });

export const curatedPhotosArgsSchema = z.object(pageArgs);

export const popularVideosArgsSchema = z.object({
  min_width: z.number().int().min(1).optional(),
  min_height: z.number().int().min(1).optional(),
  min_duration: z.number().int().min(1).optional(),
  max_duration: z.number().int().min(1).optional(),
  ...pageArgs,
});

export const mediaIdArgsSchema = z.object({
  id: z.number().int().min(1),
});

const pageProperties = {
  page: {
    type: 'number',
    description: 'Page number for pagination',
    default: 1,
  },
  per_page: {
    type: 'number',
    description: 'Results per page (max 80)',
    default: 15,
  },
};

const searchProperties = {
  query: {
    type: 'string',
    description: 'Search query, e.g. "ocean" or "people working"',
  },
  ...pageProperties,
  orientation: {
    type: 'string',
    enum: [...ORIENTATIONS],
    description: 'Desired orientation',
  },
  size: {
    type: 'string',
    enum: [...SIZES],
    description: 'Minimum size',
  },
  locale: {
    type: 'string',
    enum: [...LOCALES],
    description: 'Locale of the search query',
  },
};

/** Photo and video lookups exposed as MCP tools. */
export class MediaSearchTool {
  constructor(private readonly client: PexelsClient) {}

  getTools(): Tool[] {
    return [
      {
        name: 'search_photos',
        description: 'Search Pexels photos by keyword with optional orientation, size, colour and locale filters',
        inputSchema: {
          type: 'object',
          properties: {
            ...searchProperties,
            color: {
              type: 'string',
              description: 'Named colour (red, orange, yellow, green, turquoise, blue, violet, pink, brown, black, gray, white) or hex code like #ffffff',
            },
          },
          required: ['query'],
        },
      },
      {
        name: 'curated_photos',
        description: 'List photos curated by the Pexels team',
        inputSchema: {
          type: 'object',
          properties: pageProperties,
        },
      },
      {
        name: 'get_photo',
        description: 'Get a single Pexels photo by id',
        inputSchema: {
          type: 'object',
          properties: {
            id: { type: 'number', description: 'Photo id' },
          },
          required: ['id'],
        },
      },
      {
        name: 'search_videos',
        description: 'Search Pexels videos by keyword with optional orientation, size and locale filters',
        inputSchema: {
          type: 'object',
          properties: searchProperties,
          required: ['query'],
        },
      },
      {
        name: 'popular_videos',
        description: 'List currently popular Pexels videos',
        inputSchema: {
          type: 'object',
          properties: {
            min_width: { type: 'number', description: 'Minimum width in pixels' },
            min_height: { type: 'number', description: 'Minimum height in pixels' },
            min_duration: { type: 'number', description: 'Minimum duration in seconds' },
            max_duration: { type: 'number', description: 'Maximum duration in seconds' },
            ...pageProperties,
          },
        },
      },
      {
        name: 'get_video',
        description: 'Get a single Pexels video by id',
        inputSchema: {
          type: 'object',
          properties: {
            id: { type: 'number', description: 'Video id' },
          },
          required: ['id'],
        },
      },
    ];
  }

  async searchPhotos(args: unknown): Promise<PhotosResponse> {
    const { query, page, per_page, orientation, size, color, locale } = searchPhotosArgsSchema.parse(args);
    const builder = new SearchBuilder().query(query);
    if (page !== undefined) builder.page(page);
    if (per_page !== undefined) builder.perPage(per_page);
    if (orientation) builder.orientation(orientation);
    if (size) builder.size(size);
    if (color) builder.color(color);
    if (locale) builder.locale(locale);
    return this.client.searchPhotos(builder);
  }

  async curatedPhotos(args: unknown): Promise<PhotosResponse> {
    const { page, per_page } = curatedPhotosArgsSchema.parse(args);
    const builder = new CuratedBuilder();
    if (page !== undefined) builder.page(page);
    if (per_page !== undefined) builder.perPage(per_page);
    return this.client.curatedPhotos(builder);
  }

  async getPhoto(args: unknown): Promise<Photo> {
    const { id } = mediaIdArgsSchema.parse(args);
    return this.client.getPhoto(id);
  }

  async searchVideos(args: unknown): Promise<VideoResponse> {
    const { query, page, per_page, orientation, size, locale } = searchVideosArgsSchema.parse(args);
    const builder = new VideoSearchBuilder().query(query);
    if (page !== undefined) builder.page(page);
    if (per_page !== undefined) builder.perPage(per_page);
    if (orientation) builder.orientation(orientation);
    if (size) builder.size(size);
    if (locale) builder.locale(locale);
    return this.client.searchVideos(builder);
  }

  async popularVideos(args: unknown): Promise<VideoResponse> {
    const params = popularVideosArgsSchema.parse(args);
    const builder = new PopularBuilder();
    if (params.min_width !== undefined) builder.minWidth(params.min_width);
    if (params.min_height !== undefined) builder.minHeight(params.min_height);
    if (params.min_duration !== undefined) builder.minDuration(params.min_duration);
    if (params.max_duration !== undefined) builder.maxDuration(params.max_duration);
    if (params.page !== undefined) builder.page(params.page);
    if (params.per_page !== undefined) builder.perPage(params.per_page);
    return this.client.popularVideos(builder);
  }

  async getVideo(args: unknown): Promise<Video> {
    const { id } = mediaIdArgsSchema.parse(args);
    return this.client.getVideo(id);
  }
}
