import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { ZodError } from 'zod';
import { isPexelsError } from '../errors.js';
import { CollectionBrowserTool } from './collection-browser.js';
import { MediaSearchTool } from './media-search.js';

export interface PexelsTools {
  media: MediaSearchTool;
  collections: CollectionBrowserTool;
}

function textResult(value: unknown, isError = false): CallToolResult {
  return {
    content: [
      {
        type: 'text',
        text: JSON.stringify(value, null, 2),
      },
    ],
    ...(isError ? { isError: true } : {}),
  };
}

async function runTool(tools: PexelsTools, name: string, args: Record<string, unknown>): Promise<unknown> {
  switch (name) {
    case 'search_photos':
      return tools.media.searchPhotos(args);
    case 'curated_photos':
      return tools.media.curatedPhotos(args);
    case 'get_photo':
      return tools.media.getPhoto(args);
    case 'search_videos':
      return tools.media.searchVideos(args);
    case 'popular_videos':
      return tools.media.popularVideos(args);
    case 'get_video':
      return tools.media.getVideo(args);
    case 'list_collections':
      return tools.collections.listCollections(args);
    case 'featured_collections':
      return tools.collections.featuredCollections(args);
    case 'collection_media':
      return tools.collections.collectionMedia(args);
    default:
      throw new Error(`Unknown tool: ${name}`);
  }
}

/**
 * Runs a tool call and renders the outcome as JSON text. Failures become an
 * `isError` result rather than a protocol error.
 */
export async function dispatchTool(
  tools: PexelsTools,
  name: string,
  args: Record<string, unknown> = {},
): Promise<CallToolResult> {
  try {
    return textResult(await runTool(tools, name, args));
  } catch (error) {
    console.error(`Tool ${name} failed:`, error instanceof Error ? error.message : error);

    if (error instanceof ZodError) {
      return textResult(
        {
          error: 'Invalid arguments',
          message: error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; '),
          tool: name,
        },
        true,
      );
    }

    return textResult(
      {
        error: 'Tool execution failed',
        message: error instanceof Error ? error.message : String(error),
        kind: isPexelsError(error) ? error.kind : undefined,
        tool: name,
      },
      true,
    );
  }
}
