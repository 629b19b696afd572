import type { AxiosAdapter, InternalAxiosRequestConfig } from 'axios';

export interface FakeTransport {
  adapter: AxiosAdapter;
  requests: InternalAxiosRequestConfig[];
}

/** Answers every request with `status` and `body`; objects are sent as JSON text. */
export function respondWith(status: number, body: unknown = ''): FakeTransport {
  const requests: InternalAxiosRequestConfig[] = [];
  const adapter: AxiosAdapter = async (config) => {
    requests.push(config);
    return {
      data: typeof body === 'string' ? body : JSON.stringify(body),
      status,
      statusText: '',
      headers: {},
      config,
    };
  };
  return { adapter, requests };
}

/** Rejects every request the way axios does when no response arrives. */
export function failWith(error: Error): FakeTransport {
  const requests: InternalAxiosRequestConfig[] = [];
  const adapter: AxiosAdapter = async (config) => {
    requests.push(config);
    throw error;
  };
  return { adapter, requests };
}

export function photoSrc(id: number) {
  const base = `https://images.pexels.com/photos/${id}/pexels-photo-${id}.jpeg`;
  return {
    original: base,
    large2x: `${base}?auto=compress&cs=tinysrgb&dpr=2&h=650&w=940`,
    large: `${base}?auto=compress&cs=tinysrgb&h=650&w=940`,
    medium: `${base}?auto=compress&cs=tinysrgb&h=350`,
    small: `${base}?auto=compress&cs=tinysrgb&h=130`,
    portrait: `${base}?auto=compress&cs=tinysrgb&fit=crop&h=1200&w=800`,
    landscape: `${base}?auto=compress&cs=tinysrgb&fit=crop&h=627&w=1200`,
    tiny: `${base}?auto=compress&cs=tinysrgb&dpr=1&fit=crop&h=200&w=280`,
  };
}

export function photo(id: number) {
  return {
    id,
    width: 3000,
    height: 2000,
    url: `https://www.pexels.com/photo/sample-${id}/`,
    photographer: 'Sample Photographer',
    photographer_url: 'https://www.pexels.com/@sample',
    photographer_id: 42,
    avg_color: '#7E7E7E',
    src: photoSrc(id),
    liked: false,
    alt: 'Sample photo',
  };
}

export function video(id: number) {
  return {
    id,
    width: 1920,
    height: 1080,
    url: `https://www.pexels.com/video/sample-${id}/`,
    image: `https://images.pexels.com/videos/${id}/preview.jpeg`,
    full_res: null,
    tags: [],
    duration: 12,
    user: { id: 7, name: 'Sample Uploader', url: 'https://www.pexels.com/@uploader' },
    video_files: [
      {
        id: 1,
        quality: 'hd',
        file_type: 'video/mp4',
        width: 1280,
        height: 720,
        fps: 29.97,
        link: `https://videos.pexels.com/video-files/${id}/hd.mp4`,
      },
    ],
    video_pictures: [{ id: 1, picture: `https://images.pexels.com/videos/${id}/pic-0.jpeg`, nr: 0 }],
  };
}

export function collection(id: string) {
  return {
    id,
    title: 'Sample collection',
    description: null,
    private: false,
    media_count: 3,
    photos_count: 2,
    videos_count: 1,
  };
}

export function page<K extends string, T>(key: K, items: T[], extra: Record<string, unknown> = {}) {
  return {
    page: 1,
    per_page: 15,
    total_results: items.length,
    [key]: items,
    ...extra,
  };
}
