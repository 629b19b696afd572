import { describe, expect, it } from 'vitest';

import { Curated, CuratedBuilder, FetchPhotoBuilder, Search, SearchBuilder } from './photos.js';

describe('photo search uri', () => {
  it('renders only the query when nothing else is set', () => {
    expect(new SearchBuilder().query('mountains').build().createUri()).toBe(
      'https://api.pexels.com/v1/search?query=mountains',
    );
  });

  it('renders every parameter once in a fixed order', () => {
    const uri = Search.builder()
      .locale('ru-RU')
      .color('#FFAA00')
      .size('medium')
      .orientation('landscape')
      .perPage(40)
      .page(2)
      .query('mountains at dusk')
      .build()
      .createUri();

    expect(uri).toBe(
      'https://api.pexels.com/v1/search?query=mountains+at+dusk&page=2&per_page=40&orientation=landscape&size=medium&color=%23ffaa00&locale=ru-RU',
    );
  });

  it('renders named colours as-is', () => {
    expect(new SearchBuilder().query('sea').color('Turquoise').build().createUri()).toBe(
      'https://api.pexels.com/v1/search?query=sea&color=turquoise',
    );
  });

  it('rejects malformed colours when they are set', () => {
    expect(() => new SearchBuilder().color('#ff')).toThrow('Invalid hex color code: #ff');
  });

  it('is deterministic', () => {
    const build = () => new SearchBuilder().query('tigers').page(3).size('large').build().createUri();
    expect(build()).toBe(build());
  });

  it('is unaffected by later builder changes', () => {
    const builder = new SearchBuilder().query('tigers');
    const search = builder.build();
    builder.page(9);
    expect(search.createUri()).toBe('https://api.pexels.com/v1/search?query=tigers');
  });

  it('renders against a custom base url', () => {
    expect(new SearchBuilder().query('cats').build().createUri('http://localhost:8080/')).toBe(
      'http://localhost:8080/v1/search?query=cats',
    );
  });
});

describe('curated uri', () => {
  it('has no query string by default', () => {
    expect(Curated.builder().build().createUri()).toBe('https://api.pexels.com/v1/curated');
  });

  it('renders pagination', () => {
    expect(new CuratedBuilder().perPage(1).page(1).build().createUri()).toBe(
      'https://api.pexels.com/v1/curated?page=1&per_page=1',
    );
  });

  it('reports an unparseable base url', () => {
    expect(() => new CuratedBuilder().build().createUri('not a url')).toThrow(/^Failed to parse URL: /);
  });
});

describe('fetch photo uri', () => {
  it('embeds the id in the path', () => {
    expect(new FetchPhotoBuilder().id(123).build().createUri()).toBe('https://api.pexels.com/v1/photos/123');
  });

  it('still renders a url without an id', () => {
    expect(new FetchPhotoBuilder().build().createUri()).toBe('https://api.pexels.com/v1/photos/0');
  });
});
