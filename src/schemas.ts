import { z } from 'zod';

// Response shapes as documented at https://www.pexels.com/api/documentation/

export const photoSrcSchema = z.object({
  original: z.string(),
  large2x: z.string(),
  large: z.string(),
  medium: z.string(),
  small: z.string(),
  portrait: z.string(),
  landscape: z.string(),
  tiny: z.string(),
});

export type PhotoSrc = Readonly<z.infer<typeof photoSrcSchema>>;

export const photoSchema = z.object({
  id: z.number().int(),
  width: z.number().int(),
  height: z.number().int(),
  url: z.string(),
  photographer: z.string(),
  photographer_url: z.string(),
  photographer_id: z.number().int(),
  avg_color: z.string().nullable(),
  src: photoSrcSchema,
  liked: z.boolean(),
  alt: z.string().nullable(),
});

export type Photo = Readonly<z.infer<typeof photoSchema>>;

export const userSchema = z.object({
  id: z.number().int(),
  name: z.string(),
  url: z.string(),
});

export type User = Readonly<z.infer<typeof userSchema>>;

export const videoFileSchema = z.object({
  id: z.number().int(),
  // null for adaptive (hls) renditions
  quality: z.string().nullable(),
  file_type: z.string(),
  width: z.number().int().nullable(),
  height: z.number().int().nullable(),
  fps: z.number().nullable(),
  link: z.string(),
});

export type VideoFile = Readonly<z.infer<typeof videoFileSchema>>;

export const videoPictureSchema = z.object({
  id: z.number().int(),
  picture: z.string(),
  nr: z.number().int(),
});

export type VideoPicture = Readonly<z.infer<typeof videoPictureSchema>>;

export const videoSchema = z.object({
  id: z.number().int(),
  width: z.number().int(),
  height: z.number().int(),
  url: z.string(),
  image: z.string(),
  full_res: z.string().nullish(),
  tags: z.array(z.string()),
  duration: z.number().int(),
  user: userSchema,
  video_files: z.array(videoFileSchema),
  video_pictures: z.array(videoPictureSchema),
});

export type Video = Readonly<z.infer<typeof videoSchema>>;

export const collectionSchema = z.object({
  id: z.string(),
  title: z.string(),
  description: z.string().nullish(),
  private: z.boolean(),
  media_count: z.number().int(),
  photos_count: z.number().int(),
  videos_count: z.number().int(),
});

export type Collection = Readonly<z.infer<typeof collectionSchema>>;

const pageSchema = z.object({
  page: z.number().int(),
  per_page: z.number().int(),
  total_results: z.number().int(),
  next_page: z.string().nullish(),
  prev_page: z.string().nullish(),
});

export const photosResponseSchema = pageSchema.extend({
  photos: z.array(photoSchema),
});

export type PhotosResponse = Readonly<z.infer<typeof photosResponseSchema>>;

export const videoResponseSchema = pageSchema.extend({
  url: z.string().optional(),
  videos: z.array(videoSchema),
});

export type VideoResponse = Readonly<z.infer<typeof videoResponseSchema>>;

export const collectionsResponseSchema = pageSchema.extend({
  collections: z.array(collectionSchema),
});

export type CollectionsResponse = Readonly<z.infer<typeof collectionsResponseSchema>>;

// Collection media entries carry fewer guarantees than the standalone endpoints.
export const mediaPhotoSchema = photoSchema.extend({
  type: z.literal('Photo'),
  url: z.string().nullish(),
  photographer: z.string().nullish(),
  photographer_url: z.string().nullish(),
  alt: z.string().nullish(),
});

export type MediaPhoto = Readonly<z.infer<typeof mediaPhotoSchema>>;

export const mediaVideoSchema = videoSchema.extend({
  type: z.literal('Video'),
  url: z.string().nullish(),
  image: z.string().nullish(),
  avg_color: z.string().nullish(),
});

export type MediaVideo = Readonly<z.infer<typeof mediaVideoSchema>>;

export const mediaItemSchema = z.discriminatedUnion('type', [mediaPhotoSchema, mediaVideoSchema]);

export type MediaItem = MediaPhoto | MediaVideo;

export const mediaResponseSchema = pageSchema.extend({
  id: z.string(),
  media: z.array(mediaItemSchema),
});

export type MediaResponse = Readonly<z.infer<typeof mediaResponseSchema>>;
