export type PexelsErrorKind =
  | 'request'
  | 'json_parse'
  | 'url_parse'
  | 'api_key_not_found'
  | 'hex_color_code'
  | 'parse_media_type'
  | 'parse_media_sort'
  | 'parse_orientation'
  | 'parse_size'
  | 'parse_locale'
  | 'auth'
  | 'rate_limit'
  | 'not_found'
  | 'api';

// Kinds that wrap a lower-level failure and compare by rendered message.
const WRAPPED_KINDS: ReadonlySet<PexelsErrorKind> = new Set<PexelsErrorKind>(['request', 'json_parse', 'url_parse']);

/**
 * Every failure surfaced by the client. `kind` is closed; `detail` carries the
 * offending value or identifier, `status` the HTTP status for `api` errors.
 */
export class PexelsError extends Error {
  readonly kind: PexelsErrorKind;
  readonly detail?: string;
  readonly status?: number;

  private constructor(kind: PexelsErrorKind, message: string, detail?: string, status?: number) {
    super(message);
    this.name = 'PexelsError';
    this.kind = kind;
    this.detail = detail;
    this.status = status;
  }

  static request(cause: string): PexelsError {
    return new PexelsError('request', `Failed to send HTTP request: ${cause}`);
  }

  static jsonParse(cause: string): PexelsError {
    return new PexelsError('json_parse', `Failed to parse JSON response: ${cause}`);
  }

  static urlParse(cause: string): PexelsError {
    return new PexelsError('url_parse', `Failed to parse URL: ${cause}`);
  }

  static apiKeyNotFound(variable = 'PEXELS_API_KEY'): PexelsError {
    return new PexelsError('api_key_not_found', `API key not found in environment variables: ${variable}`, variable);
  }

  static hexColorCode(value: string): PexelsError {
    return new PexelsError('hex_color_code', `Invalid hex color code: ${value}`, value);
  }

  static parseMediaType(value: string): PexelsError {
    return new PexelsError('parse_media_type', `Failed to parse media type: invalid value '${value}'`, value);
  }

  static parseMediaSort(value: string): PexelsError {
    return new PexelsError('parse_media_sort', `Failed to parse media sort: invalid value '${value}'`, value);
  }

  static parseOrientation(value: string): PexelsError {
    return new PexelsError('parse_orientation', `Failed to parse orientation: invalid value '${value}'`, value);
  }

  static parseSize(value: string): PexelsError {
    return new PexelsError('parse_size', `Failed to parse size: invalid value '${value}'`, value);
  }

  static parseLocale(value: string): PexelsError {
    return new PexelsError('parse_locale', `Failed to parse locale: invalid value '${value}'`, value);
  }

  static auth(reason = 'Invalid API key'): PexelsError {
    return new PexelsError('auth', `Authentication failed: ${reason}`, reason);
  }

  static rateLimit(): PexelsError {
    return new PexelsError('rate_limit', 'Rate limit exceeded');
  }

  /** `resource` names what was requested, e.g. "Photo". */
  static notFound(resource: string, id: string): PexelsError {
    return new PexelsError('not_found', `${resource} with ID ${id} not found`, id);
  }

  static api(status: number): PexelsError {
    return new PexelsError('api', `API request failed with status: ${status}`, undefined, status);
  }

  equals(other: PexelsError): boolean {
    if (this.kind !== other.kind) {
      return false;
    }
    if (WRAPPED_KINDS.has(this.kind)) {
      return this.message === other.message;
    }
    return this.detail === other.detail && this.status === other.status;
  }
}

export function isPexelsError(error: unknown): error is PexelsError {
  return error instanceof PexelsError;
}
