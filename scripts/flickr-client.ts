import { z } from 'zod';
import { urlPath } from './imgur-client';
import { ImageUrlCollection } from './types';

const FLICKR_REST_URL = 'https://www.flickr.com/services/rest/';
const PHOTO_PATTERN = /^\/photos\/[@a-z0-9_-]+\/(\d+)(?:\/.*)?$/i;
const ORIGINAL_SIZE = 'Original';

const FlickrResponseSchema = z.union([
  z.object({
    stat: z.literal('ok'),
    sizes: z.object({
      size: z.array(z.object({ label: z.string(), source: z.string() })),
    }),
  }),
  z.object({
    stat: z.literal('fail'),
    code: z.number(),
    message: z.string(),
  }),
]);

export class FlickrClient {
  constructor(
    private readonly apiKey: string,
    private readonly requestTimeout = 10000,
  ) {}

  async getImageUrls(url: string): Promise<ImageUrlCollection | null> {
    const pathname = urlPath(url);
    const photo = pathname === null ? null : PHOTO_PATTERN.exec(pathname);
    if (!photo) return null;

    return { kind: 'single', url: await this.getOriginalUrl(photo[1]), specialSource: 'Flickr' };
  }

  private async getOriginalUrl(photoId: string): Promise<string> {
    const params = new URLSearchParams({
      method: 'flickr.photos.getSizes',
      api_key: this.apiKey,
      photo_id: photoId,
      format: 'json',
      nojsoncallback: '1',
    });

    const response = await fetch(`${FLICKR_REST_URL}?${params.toString()}`, {
      signal: AbortSignal.timeout(this.requestTimeout),
    });
    if (!response.ok) {
      throw new Error(`Flickr API error: status ${response.status}`);
    }

    const body = FlickrResponseSchema.parse(await response.json());
    if (body.stat === 'fail') {
      throw new Error(`Flickr error ${body.code}: ${body.message}`);
    }

    const original = body.sizes.size.find((size) => size.label === ORIGINAL_SIZE);
    if (!original) {
      throw new Error(`No size definition found for label '${ORIGINAL_SIZE}' of photo with ID ${photoId}`);
    }
    return original.source;
  }
}
