import { z } from 'zod';
import { ImageUrlCollection } from './types';

const IMGUR_API_URL = 'https://api.imgur.com/3';

// Matched against the URL path
const ALBUM_PATTERNS = [
  /^\/(?:a|gallery)\/([a-z0-9]+)(?:\.[a-z0-9]+)?\/?$/i,
  /^\/t\/[^/]+\/([a-z0-9]+)(?:\.[a-z0-9]+)?\/?$/i,
];
const IMAGE_PATTERN = /^\/([a-z0-9]+)(?:\.[a-z0-9]+)?\/?$/i;

const ImgurEnvelopeSchema = z.object({
  success: z.boolean(),
  status: z.number(),
  data: z.unknown(),
});

const ImgurErrorSchema = z.object({ error: z.unknown().optional() });
const ImgurImageSchema = z.object({ link: z.string() });
const ImgurAlbumSchema = z.object({ images: z.array(ImgurImageSchema) });

export function urlPath(url: string): string | null {
  try {
    return new URL(url.trim()).pathname;
  } catch {
    return null;
  }
}

export class ImgurClient {
  constructor(
    private readonly clientId: string,
    private readonly requestTimeout = 10000,
  ) {}

  /**
   * Album and tag-gallery links resolve to every image in the album, any
   * other imgur link to a single image. Returns null for links that match
   * neither shape.
   */
  async getImageUrls(url: string): Promise<ImageUrlCollection | null> {
    const pathname = urlPath(url);
    if (pathname === null) return null;

    for (const pattern of ALBUM_PATTERNS) {
      const album = pattern.exec(pathname);
      if (album) {
        const data = await this.get(`/album/${album[1]}`, ImgurAlbumSchema);
        return { kind: 'gallery', urls: data.images.map((image) => image.link), specialSource: 'Imgur' };
      }
    }

    const image = IMAGE_PATTERN.exec(pathname);
    if (image) {
      const data = await this.get(`/image/${image[1]}`, ImgurImageSchema);
      return { kind: 'single', url: data.link, specialSource: 'Imgur' };
    }

    return null;
  }

  private async get<T>(path: string, schema: z.ZodType<T>): Promise<T> {
    const response = await fetch(`${IMGUR_API_URL}${path}`, {
      headers: { Authorization: `Client-ID ${this.clientId}` },
      signal: AbortSignal.timeout(this.requestTimeout),
    });

    if (!response.ok) {
      throw new Error(`Imgur API error for ${path}: status ${response.status}`);
    }

    const envelope = ImgurEnvelopeSchema.parse(await response.json());
    if (!envelope.success) {
      const detail = ImgurErrorSchema.safeParse(envelope.data);
      const error = detail.success && detail.data.error !== undefined ? `: ${String(detail.data.error)}` : '';
      throw new Error(`Imgur error ${envelope.status}${error}`);
    }

    return schema.parse(envelope.data);
  }
}
