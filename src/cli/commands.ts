import { parseArgs } from 'util';
import { z } from 'zod';
import type { PexelsClient } from '../client.js';
import { CuratedBuilder, SearchBuilder } from '../builders/photos.js';
import { PopularBuilder, VideoSearchBuilder } from '../builders/videos.js';
import { CollectionsBuilder, FeaturedBuilder, MediaBuilder } from '../builders/collections.js';
import {
  parseLocale,
  parseMediaSort,
  parseMediaType,
  parseOrientation,
  parseSize,
} from '../types/index.js';

export const COMMANDS = [
  'search-photos',
  'curated-photos',
  'get-photo',
  'search-videos',
  'popular-videos',
  'get-video',
  'search-collections',
  'featured-collections',
  'search-media',
] as const;

export type CommandName = (typeof COMMANDS)[number];

export const USAGE = `Usage: pexels-cli <command> [options]

Commands:
  search-photos         --query <text> [--orientation] [--size] [--color] [--locale]
  curated-photos
  get-photo             --id <number>
  search-videos         --query <text> [--orientation] [--size] [--locale]
  popular-videos        [--min-width] [--min-height] [--min-duration] [--max-duration]
  get-video             --id <number>
  search-collections
  featured-collections
  search-media          --id <collection> [--type photos|videos] [--sort asc|desc]

Listing commands also take --page (default 1) and --per-page (default 15).
The API key is read from PEXELS_API_KEY.`;

const OPTIONS = {
  query: { type: 'string', short: 'q' },
  id: { type: 'string', short: 'i' },
  page: { type: 'string', short: 'p', default: '1' },
  'per-page': { type: 'string', short: 'n', default: '15' },
  orientation: { type: 'string' },
  size: { type: 'string' },
  color: { type: 'string' },
  locale: { type: 'string' },
  type: { type: 'string', short: 't', default: '' },
  sort: { type: 'string', short: 's', default: 'asc' },
  'min-width': { type: 'string' },
  'min-height': { type: 'string' },
  'min-duration': { type: 'string' },
  'max-duration': { type: 'string' },
} as const;

const positiveInt = (flag: string) =>
  z.coerce.number({ invalid_type_error: `--${flag} must be a number` }).int().positive({ message: `--${flag} must be a positive integer` });

function readInt(flag: string, value: string | undefined): number | undefined {
  return value === undefined ? undefined : positiveInt(flag).parse(value);
}

function requireValue(flag: string, value: string | undefined): string {
  if (!value || value.trim() === '') {
    throw new Error(`Missing required option --${flag}`);
  }
  return value;
}

/** Renders a command failure as one line per problem, without zod's raw issue dump. */
export function formatError(error: unknown): string {
  if (error instanceof z.ZodError) {
    return error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('\n');
  }
  return error instanceof Error ? error.message : String(error);
}

export function isCommand(name: string): name is CommandName {
  return COMMANDS.some((command) => command === name);
}

/**
 * Parses `argv` (without the node and script entries) and runs the command
 * against `client`, resolving to the decoded API response.
 */
export async function runCommand(client: PexelsClient, argv: string[]): Promise<unknown> {
  const { values, positionals } = parseArgs({ args: argv, options: OPTIONS, allowPositionals: true });
  const [command] = positionals;
  if (!command || !isCommand(command)) {
    throw new Error(command ? `Unknown command: ${command}\n\n${USAGE}` : USAGE);
  }

  const page = readInt('page', values.page);
  const perPage = readInt('per-page', values['per-page']);

  switch (command) {
    case 'search-photos': {
      const builder = new SearchBuilder().query(requireValue('query', values.query));
      if (page !== undefined) builder.page(page);
      if (perPage !== undefined) builder.perPage(perPage);
      if (values.orientation) builder.orientation(parseOrientation(values.orientation));
      if (values.size) builder.size(parseSize(values.size));
      if (values.color) builder.color(values.color);
      if (values.locale) builder.locale(parseLocale(values.locale));
      return client.searchPhotos(builder);
    }

    case 'curated-photos': {
      const builder = new CuratedBuilder();
      if (page !== undefined) builder.page(page);
      if (perPage !== undefined) builder.perPage(perPage);
      return client.curatedPhotos(builder);
    }

    case 'get-photo':
      return client.getPhoto(positiveInt('id').parse(requireValue('id', values.id)));

    case 'search-videos': {
      const builder = new VideoSearchBuilder().query(requireValue('query', values.query));
      if (page !== undefined) builder.page(page);
      if (perPage !== undefined) builder.perPage(perPage);
      if (values.orientation) builder.orientation(parseOrientation(values.orientation));
      if (values.size) builder.size(parseSize(values.size));
      if (values.locale) builder.locale(parseLocale(values.locale));
      return client.searchVideos(builder);
    }

    case 'popular-videos': {
      const builder = new PopularBuilder();
      const minWidth = readInt('min-width', values['min-width']);
      const minHeight = readInt('min-height', values['min-height']);
      const minDuration = readInt('min-duration', values['min-duration']);
      const maxDuration = readInt('max-duration', values['max-duration']);
      if (minWidth !== undefined) builder.minWidth(minWidth);
      if (minHeight !== undefined) builder.minHeight(minHeight);
      if (minDuration !== undefined) builder.minDuration(minDuration);
      if (maxDuration !== undefined) builder.maxDuration(maxDuration);
      if (page !== undefined) builder.page(page);
      if (perPage !== undefined) builder.perPage(perPage);
      return client.popularVideos(builder);
    }

    case 'get-video':
      return client.getVideo(positiveInt('id').parse(requireValue('id', values.id)));

    case 'search-collections': {
      const builder = new CollectionsBuilder();
      if (page !== undefined) builder.page(page);
      if (perPage !== undefined) builder.perPage(perPage);
      return client.collections(builder);
    }

    case 'featured-collections': {
      const builder = new FeaturedBuilder();
      if (page !== undefined) builder.page(page);
      if (perPage !== undefined) builder.perPage(perPage);
      return client.featuredCollections(builder);
    }

    case 'search-media': {
      const builder = new MediaBuilder()
        .id(requireValue('id', values.id))
        .type(parseMediaType(values.type ?? ''))
        .sort(parseMediaSort(values.sort ?? 'asc'));
      if (page !== undefined) builder.page(page);
      if (perPage !== undefined) builder.perPage(perPage);
      return client.collectionMedia(builder);
    }
  }
}
