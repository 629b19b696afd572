import { PexelsError } from '../errors.js';

export const ORIENTATIONS = ['landscape', 'portrait', 'square'] as const;
export type Orientation = (typeof ORIENTATIONS)[number];

/** Minimum photo/video size. */
export const SIZES = ['large', 'medium', 'small'] as const;
export type Size = (typeof SIZES)[number];

/** Order of items in a collection. The API defaults to `asc`. */
export const MEDIA_SORTS = ['asc', 'desc'] as const;
export type MediaSort = (typeof MEDIA_SORTS)[number];

/**
 * Filter for collection media. `all` sends no `type` parameter, which makes the
 * API return photos and videos together.
 */
export const MEDIA_TYPES = ['photos', 'videos', 'all'] as const;
export type MediaType = (typeof MEDIA_TYPES)[number];

export const LOCALES = [
  'en-US',
  'pt-BR',
  'es-ES',
  'ca-ES',
  'de-DE',
  'it-IT',
  'fr-FR',
  'sv-SE',
  'id-ID',
  'pl-PL',
  'ja-JP',
  'zh-TW',
  'zh-CN',
  'ko-KR',
  'th-TH',
  'nl-NL',
  'hu-HU',
  'vi-VN',
  'cs-CZ',
  'da-DK',
  'fi-FI',
  'uk-UA',
  'el-GR',
  'ro-RO',
  'nb-NO',
  'sk-SK',
  'tr-TR',
  'ru-RU',
] as const;
export type Locale = (typeof LOCALES)[number];

export const NAMED_COLORS = [
  'red',
  'orange',
  'yellow',
  'green',
  'turquoise',
  'blue',
  'violet',
  'pink',
  'brown',
  'black',
  'gray',
  'white',
] as const;
export type NamedColor = (typeof NAMED_COLORS)[number];

/** A `#rrggbb` code, normalised to lowercase with the leading hash. */
export type HexColor = `#${string}`;

export type Color = NamedColor | HexColor;

function findCaseInsensitive<T extends string>(values: readonly T[], input: string): T | undefined {
  const needle = input.trim().toLowerCase();
  return values.find((value) => value.toLowerCase() === needle);
}

export function parseOrientation(input: string): Orientation {
  const orientation = findCaseInsensitive(ORIENTATIONS, input);
  if (!orientation) {
    throw PexelsError.parseOrientation(input);
  }
  return orientation;
}

export function renderOrientation(orientation: Orientation): string {
  return orientation;
}

export function parseSize(input: string): Size {
  const size = findCaseInsensitive(SIZES, input);
  if (!size) {
    throw PexelsError.parseSize(input);
  }
  return size;
}

export function renderSize(size: Size): string {
  return size;
}

export function parseMediaSort(input: string): MediaSort {
  const sort = findCaseInsensitive(MEDIA_SORTS, input);
  if (!sort) {
    throw PexelsError.parseMediaSort(input);
  }
  return sort;
}

export function renderMediaSort(sort: MediaSort): string {
  return sort;
}

/**
 * Accepts the singular and plural spellings; an empty string (or `all`) means
 * no filter.
 */
export function parseMediaType(input: string): MediaType {
  switch (input.trim().toLowerCase()) {
    case 'photo':
    case 'photos':
      return 'photos';
    case 'video':
    case 'videos':
      return 'videos';
    case '':
    case 'all':
      return 'all';
    default:
      throw PexelsError.parseMediaType(input);
  }
}

export function renderMediaType(type: MediaType): string {
  return type === 'all' ? '' : type;
}

/** Accepts `en-US` as well as `en_us`. */
export function parseLocale(input: string): Locale {
  const locale = findCaseInsensitive(LOCALES, input.replace('_', '-'));
  if (!locale) {
    throw PexelsError.parseLocale(input);
  }
  return locale;
}

export function renderLocale(locale: Locale): string {
  return locale;
}

const HEX_COLOR = /^#?([0-9a-f]{6})$/i;

/**
 * Parses a colour filter: one of the named colours, or a six digit hex code
 * with or without the leading `#`.
 */
export function parseColor(input: string): Color {
  const named = findCaseInsensitive(NAMED_COLORS, input);
  if (named) {
    return named;
  }
  const match = HEX_COLOR.exec(input.trim());
  if (!match) {
    throw PexelsError.hexColorCode(input);
  }
  return `#${match[1].toLowerCase()}`;
}

export function renderColor(color: Color): string {
  return color;
}
