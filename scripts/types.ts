import { z } from 'zod';

// Reddit API types
const MediaMetadataItemSchema = z.object({
  status: z.string().optional(),
  e: z.string().optional(),
  m: z.string().optional(),
  s: z
    .object({
      u: z.string().optional(),
      gif: z.string().optional(),
      x: z.number().optional(),
      y: z.number().optional(),
    })
    .optional(),
});

export const RedditPostSchema = z.object({
  id: z.string(),
  title: z.string(),
  author: z.string(),
  subreddit: z.string(),
  url: z.string(),
  permalink: z.string(),
  domain: z.string(),
  created_utc: z.number(),
  score: z.number().default(0),
  is_video: z.boolean().default(false),
  post_hint: z.string().optional(),
  is_gallery: z.boolean().optional(),
  gallery_data: z
    .object({
      items: z.array(z.object({ media_id: z.string() })),
    })
    .nullish(),
  media_metadata: z.record(MediaMetadataItemSchema).nullish(),
  crosspost_parent: z.string().optional(),
});

export type RedditPost = z.infer<typeof RedditPostSchema>;
export type MediaMetadataItem = z.infer<typeof MediaMetadataItemSchema>;

// Classification vocabulary
export enum ImageResult {
  LARGER = 'IMAGE LARGER THAN TITLE',
  SMALLER = 'IMAGE SMALLER THAN TITLE',
  UNSUPPORTED_MEDIA_TYPE = 'UNSUPPORTED MEDIA TYPE',
  VALID = 'VALID',
}

export enum PostResult {
  LARGER = 'IMAGE LARGER THAN TITLE',
  NO_RESOLUTION = 'NO RESOLUTION IN TITLE',
  SMALLER = 'IMAGE SMALLER THAN TITLE',
  UNSUPPORTED_MEDIA_TYPE = 'UNSUPPORTED MEDIA TYPE',
  UNSUPPORTED_RES = 'UNSUPPORTED RESOLUTION',
  UNSUPPORTED_TYPE_OR_LINK = 'UNSUPPORTED POST TYPE OR LINK',
  MODPOST = 'MODPOST',
  VALID = 'VALID',
}

export enum PostType {
  GALLERY = 'GALLERY',
  IMAGE = 'IMAGE',
  UNKNOWN = 'UNKNOWN',
}

/**
 * Scale a declared resolution was accepted at: 1 is a single monitor, 2 and 3
 * are dual and triple monitor spans. 0 means no known-good match.
 */
export type ResolutionScale = 0 | 1 | 2 | 3;

export type Resolution = readonly [width: number, height: number];

export type TitleToken =
  | { kind: 'text'; value: string }
  | {
      kind: 'resolution';
      value: string;
      start: number;
      end: number;
      resolution: Resolution;
      scale: ResolutionScale;
    };

export type ImageUrlCollection =
  | { kind: 'single'; url: string; specialSource?: string }
  | { kind: 'gallery'; urls: string[]; specialSource?: string };

export type DimensionLookup =
  | { ok: true; width: number; height: number; format: string }
  | { ok: false; contentType: string | null };

export interface SubmissionImage {
  url: string;
  format: string;
  width: number;
  height: number;
  result: ImageResult;
}

export interface Submission {
  postId: string;
  title: string;
  author: string | null;
  permalink: string;
  domain: string;
  dateSubmitted: Date;
  resolutions: Resolution[];
  titleTokens: TitleToken[];
  goodResolutions: Resolution[];
  type: PostType;
  result: PostResult;
  specialSource: string | null;
  response: string | null;
  images: SubmissionImage[];
}

// Database types
export interface SubmissionRow {
  post_id: string;
  title: string;
  author: string | null;
  permalink: string;
  res: string;
  date_submitted: string;
  date_processed: string;
  domain: string;
  removed: boolean;
  result: PostResult;
  response: string | null;
  type: PostType;
}

export interface ImageRow {
  post_id: string;
  url: string;
  format: string;
  x: number;
  y: number;
  result: ImageResult;
}

// Moderator run types
export interface ModeratorResult {
  processed: number;
  saved: number;
  skipped: number;
  errors: number;
}
