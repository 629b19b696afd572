import { AxiosError } from 'axios';
import { describe, expect, it } from 'vitest';

import { MediaBuilder } from './builders/collections.js';
import { SearchBuilder } from './builders/photos.js';
import { VideoSearchBuilder } from './builders/videos.js';
import { PexelsClient } from './client.js';
import { PexelsError } from './errors.js';
import { collection, failWith, page, photo, respondWith, video } from './test/fixtures.js';

async function errorOf(promise: Promise<unknown>): Promise<PexelsError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof PexelsError) {
      return error;
    }
    throw error;
  }
  throw new Error('expected the request to fail');
}

describe('PexelsClient', () => {
  it('sends the raw api key as the Authorization header', async () => {
    const transport = respondWith(200, photo(123));
    const client = new PexelsClient('test-key', { adapter: transport.adapter });

    await client.getPhoto(123);

    expect(transport.requests).toHaveLength(1);
    expect(transport.requests[0].method).toBe('get');
    expect(transport.requests[0].url).toBe('https://api.pexels.com/v1/photos/123');
    expect(transport.requests[0].headers.get('Authorization')).toBe('test-key');
  });

  it('applies the default and configured timeouts', async () => {
    const defaults = respondWith(200, photo(1));
    await new PexelsClient('test-key', { adapter: defaults.adapter }).getPhoto(1);
    expect(defaults.requests[0].timeout).toBe(30000);

    const custom = respondWith(200, photo(1));
    await new PexelsClient('test-key', { adapter: custom.adapter, timeout: 5000 }).getPhoto(1);
    expect(custom.requests[0].timeout).toBe(5000);
  });

  it('renders requests against a custom base url', async () => {
    const transport = respondWith(200, video(7));
    const client = new PexelsClient('test-key', { adapter: transport.adapter, baseUrl: 'http://localhost:9000' });

    await client.getVideo(7);

    expect(transport.requests[0].url).toBe('http://localhost:9000/videos/videos/7');
  });

  it('decodes a page of photos', async () => {
    const nextPage = 'https://api.pexels.com/v1/search/?page=2&per_page=2&query=nature';
    const transport = respondWith(200, page('photos', [photo(1), photo(2)], { next_page: nextPage }));
    const client = new PexelsClient('test-key', { adapter: transport.adapter });

    const result = await client.searchPhotos(new SearchBuilder().query('nature').perPage(2));

    expect(result.photos).toHaveLength(2);
    expect(result.next_page).toBe(nextPage);
    expect(result.prev_page).toBeUndefined();
    expect(result.photos[1].src.tiny).toBe(
      'https://images.pexels.com/photos/2/pexels-photo-2.jpeg?auto=compress&cs=tinysrgb&dpr=1&fit=crop&h=200&w=280',
    );
  });

  it('decodes a page of videos', async () => {
    const transport = respondWith(200, page('videos', [video(5)], { url: 'https://www.pexels.com/search/videos/ocean/' }));
    const client = new PexelsClient('test-key', { adapter: transport.adapter });

    const result = await client.searchVideos(new VideoSearchBuilder().query('ocean'));

    expect(result.videos[0].video_files[0].fps).toBe(29.97);
    expect(result.videos[0].user.name).toBe('Sample Uploader');
  });

  it('discriminates collection media on the type field', async () => {
    const body = {
      ...page('media', [{ ...photo(1), type: 'Photo' }, { ...video(2), type: 'Video' }]),
      id: 'abc123',
    };
    const transport = respondWith(200, body);
    const client = new PexelsClient('test-key', { adapter: transport.adapter });

    const result = await client.collectionMedia(new MediaBuilder().id('abc123'));

    expect(result.media.map((item) => item.type)).toEqual(['Photo', 'Video']);
    const second = result.media[1];
    expect(second.type === 'Video' ? second.duration : undefined).toBe(12);
  });

  it('decodes collections', async () => {
    const transport = respondWith(200, page('collections', [collection('9mp14cx')]));
    const client = new PexelsClient('test-key', { adapter: transport.adapter });

    const result = await client.featuredCollections();

    expect(transport.requests[0].url).toBe('https://api.pexels.com/v1/collections/featured');
    expect(result.collections[0]).toEqual(collection('9mp14cx'));
  });

  it('accepts a null previous page link', async () => {
    const transport = respondWith(200, page('photos', [photo(1)], { prev_page: null }));
    const client = new PexelsClient('test-key', { adapter: transport.adapter });

    const result = await client.curatedPhotos();

    expect(result.prev_page).toBeNull();
    expect(result.photos[0].id).toBe(1);
  });

  it('accepts a collection without a description', async () => {
    const bare = {
      id: 'abc',
      title: 'Sample collection',
      private: false,
      media_count: 3,
      photos_count: 2,
      videos_count: 1,
    };
    const transport = respondWith(200, page('collections', [bare]));
    const client = new PexelsClient('test-key', { adapter: transport.adapter });

    const result = await client.collections();

    expect(result.collections[0].id).toBe('abc');
    expect(result.collections[0].description).toBeUndefined();
  });

  it('keeps ten idle sockets per agent by default', async () => {
    const transport = respondWith(200, photo(1));
    await new PexelsClient('test-key', { adapter: transport.adapter }).getPhoto(1);

    expect(transport.requests[0].httpAgent).toMatchObject({ keepAlive: true, maxFreeSockets: 10 });
    expect(transport.requests[0].httpsAgent).toMatchObject({ keepAlive: true, maxFreeSockets: 10 });
  });

  it('passes maxIdleConnections to both agents', async () => {
    const transport = respondWith(200, photo(1));
    await new PexelsClient('test-key', { adapter: transport.adapter, maxIdleConnections: 3 }).getPhoto(1);

    expect(transport.requests[0].httpAgent).toMatchObject({ maxFreeSockets: 3 });
    expect(transport.requests[0].httpsAgent).toMatchObject({ maxFreeSockets: 3 });
  });

  it('maps 401 to an authentication error', async () => {
    const client = new PexelsClient('test-key', { adapter: respondWith(401, { error: 'Unauthorized' }).adapter });

    const error = await errorOf(client.curatedPhotos());

    expect(error.kind).toBe('auth');
  });

  it('maps 429 to a rate limit error', async () => {
    const client = new PexelsClient('test-key', { adapter: respondWith(429).adapter });

    expect((await errorOf(client.popularVideos())).kind).toBe('rate_limit');
  });

  it('maps 404 to not found with the requested id', async () => {
    const client = new PexelsClient('test-key', { adapter: respondWith(404).adapter });

    const error = await errorOf(client.getPhoto(123));

    expect(error.kind).toBe('not_found');
    expect(error.detail).toBe('123');
    expect(error.message).toContain('123');
  });

  it('reports the request path for a 404 without an id', async () => {
    const client = new PexelsClient('test-key', { adapter: respondWith(404).adapter });

    const error = await errorOf(client.searchPhotos(new SearchBuilder().query('cats')));

    expect(error.message).toBe('Resource with ID /v1/search not found');
  });

  it('maps other statuses to an api error carrying the status', async () => {
    const client = new PexelsClient('test-key', { adapter: respondWith(503).adapter });

    const error = await errorOf(client.collections());

    expect(error.kind).toBe('api');
    expect(error.status).toBe(503);
  });

  it('reports schema mismatches as json errors', async () => {
    const client = new PexelsClient('test-key', { adapter: respondWith(200, { ...photo(1), id: 'one' }).adapter });

    const error = await errorOf(client.getPhoto(1));

    expect(error.kind).toBe('json_parse');
    expect(error.message).toBe('Failed to parse JSON response: id: Expected number, received string');
  });

  it('reports unparseable bodies as json errors', async () => {
    const client = new PexelsClient('test-key', { adapter: respondWith(200, '<html>oops</html>').adapter });

    expect((await errorOf(client.getVideo(1))).kind).toBe('json_parse');
  });

  it('rejects unknown media types', async () => {
    const body = { ...page('media', [{ ...photo(1), type: 'Audio' }]), id: 'abc123' };
    const client = new PexelsClient('test-key', { adapter: respondWith(200, body).adapter });

    expect((await errorOf(client.collectionMedia(new MediaBuilder().id('abc123')))).kind).toBe('json_parse');
  });

  it('wraps transport failures', async () => {
    const transport = failWith(new AxiosError('connect ECONNREFUSED 127.0.0.1:443', 'ECONNREFUSED'));
    const client = new PexelsClient('test-key', { adapter: transport.adapter });

    const error = await errorOf(client.getPhoto(1));

    expect(error.kind).toBe('request');
    expect(error.message).toBe('Failed to send HTTP request: ECONNREFUSED: connect ECONNREFUSED 127.0.0.1:443');
  });
});
