import { describe, expect, it } from 'vitest';

import { PexelsError, isPexelsError } from './errors.js';

describe('PexelsError', () => {
  it('compares payload-free kinds by kind', () => {
    expect(PexelsError.rateLimit().equals(PexelsError.rateLimit())).toBe(true);
    expect(PexelsError.apiKeyNotFound().equals(PexelsError.apiKeyNotFound())).toBe(true);
  });

  it('compares message-bearing kinds by payload', () => {
    expect(PexelsError.hexColorCode('#12').equals(PexelsError.hexColorCode('#12'))).toBe(true);
    expect(PexelsError.hexColorCode('#12').equals(PexelsError.hexColorCode('#34'))).toBe(false);
    expect(PexelsError.notFound('Photo', '123').equals(PexelsError.notFound('Photo', '123'))).toBe(true);
  });

  it('compares api errors by status', () => {
    expect(PexelsError.api(500).equals(PexelsError.api(500))).toBe(true);
    expect(PexelsError.api(500).equals(PexelsError.api(503))).toBe(false);
  });

  it('compares wrapped errors by rendered message', () => {
    expect(PexelsError.urlParse('Invalid URL').equals(PexelsError.urlParse('Invalid URL'))).toBe(true);
    expect(PexelsError.request('ETIMEDOUT').equals(PexelsError.request('ECONNRESET'))).toBe(false);
  });

  it('never equates different kinds', () => {
    expect(PexelsError.apiKeyNotFound().equals(PexelsError.hexColorCode('Invalid color'))).toBe(false);
    expect(PexelsError.parseSize('x').equals(PexelsError.parseOrientation('x'))).toBe(false);
  });

  it('renders messages', () => {
    expect(PexelsError.notFound('Video', '123').message).toBe('Video with ID 123 not found');
    expect(PexelsError.api(502).message).toBe('API request failed with status: 502');
    expect(PexelsError.auth().message).toBe('Authentication failed: Invalid API key');
  });

  it('is recognised by the type guard', () => {
    expect(isPexelsError(PexelsError.rateLimit())).toBe(true);
    expect(isPexelsError(new Error('Rate limit exceeded'))).toBe(false);
  });
});
