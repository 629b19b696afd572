import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import type { PexelsClient } from '../client.js';
import { CollectionsBuilder, FeaturedBuilder, MediaBuilder } from '../builders/collections.js';
import type { CollectionsResponse, MediaResponse } from '../schemas.js';
import { MEDIA_SORTS, MEDIA_TYPES } from '../types/index.js';

export const listCollectionsArgsSchema = z.object({
  page: z.number().int().min(1).optional(),
  per_page: z.number().int().min(1).max(80).optional(),
});

export const collectionMediaArgsSchema = listCollectionsArgsSchema.extend({
  id: z.string().trim().min(1, { message: 'Please provide a collection id.' }),
  type: z.enum(MEDIA_TYPES).optional(),
  sort: z.enum(MEDIA_SORTS).optional(),
});

export class CollectionBrowserTool {
  constructor(private readonly client: PexelsClient) {}

  getTools(): Tool[] {
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

    return [
      {
        name: 'list_collections',
        description: 'List the collections owned by the configured Pexels account',
        inputSchema: {
          type: 'object',
          properties: pageProperties,
        },
      },
      {
        name: 'featured_collections',
        description: 'List collections featured by Pexels',
        inputSchema: {
          type: 'object',
          properties: pageProperties,
        },
      },
      {
        name: 'collection_media',
        description: 'List the photos and videos inside a collection',
        inputSchema: {
          type: 'object',
          properties: {
            id: {
              type: 'string',
              description: 'Collection id',
            },
            type: {
              type: 'string',
              enum: [...MEDIA_TYPES],
              description: 'Restrict results to photos or videos',
              default: 'all',
            },
            sort: {
              type: 'string',
              enum: [...MEDIA_SORTS],
              description: 'Order of items in the collection',
              default: 'asc',
            },
            ...pageProperties,
          },
          required: ['id'],
        },
      },
    ];
  }

  async listCollections(args: unknown): Promise<CollectionsResponse> {
    const { page, per_page } = listCollectionsArgsSchema.parse(args);
    const builder = new CollectionsBuilder();
    if (page !== undefined) builder.page(page);
    if (per_page !== undefined) builder.perPage(per_page);
    return this.client.collections(builder);
  }

  async featuredCollections(args: unknown): Promise<CollectionsResponse> {
    const { page, per_page } = listCollectionsArgsSchema.parse(args);
    const builder = new FeaturedBuilder();
    if (page !== undefined) builder.page(page);
    if (per_page !== undefined) builder.perPage(per_page);
    return this.client.featuredCollections(builder);
  }

  async collectionMedia(args: unknown): Promise<MediaResponse> {
    const { id, type, sort, page, per_page } = collectionMediaArgsSchema.parse(args);
    const builder = new MediaBuilder().id(id);
    if (type) builder.type(type);
    if (sort) builder.sort(sort);
    if (page !== undefined) builder.page(page);
    if (per_page !== undefined) builder.perPage(per_page);
    return this.client.collectionMedia(builder);
  }
}
