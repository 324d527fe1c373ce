import { Logger } from './logger';
import { ImageUrlCollection, MediaMetadataItem, RedditPost } from './types';

const IMGUR_DOMAINS = ['imgur.com', 'm.imgur.com'];
const FLICKR_DOMAINS = ['flickr.com', 'www.flickr.com'];

export interface LinkClient {
  getImageUrls(url: string): Promise<ImageUrlCollection | null>;
}

export interface ImageUrlResolverDeps {
  fetchSubmission(postId: string): Promise<RedditPost>;
  imgur: LinkClient;
  flickr: LinkClient;
}

function galleryItemUrl(item: MediaMetadataItem): string | null {
  const url = item.s?.u ?? item.s?.gif;
  return url ? url.replace(/&amp;/g, '&') : null;
}

export class ImageUrlResolver {
  constructor(private readonly deps: ImageUrlResolverDeps) {}

  /**
   * Work out which image URLs a post points at. Returns null when the post
   * type or link is not one we know how to check.
   */
  async resolve(post: RedditPost, log: Logger): Promise<ImageUrlCollection | null> {
    if (post.crosspost_parent) {
      const [, parentId] = post.crosspost_parent.split('_');
      if (!parentId) {
        throw new Error(`Crosspost ${post.id} has a malformed parent '${post.crosspost_parent}'`);
      }
      log.detail(`Crosspost of ${parentId}`);
      const parent = await this.deps.fetchSubmission(parentId);
      return this.resolve(parent, log);
    }

    if (post.is_gallery) {
      return this.resolveGallery(post, log);
    }

    if (post.post_hint === 'image' || post.domain === 'i.redd.it') {
      return { kind: 'single', url: post.url };
    }

    if (IMGUR_DOMAINS.includes(post.domain)) {
      return this.deps.imgur.getImageUrls(post.url);
    }

    if (FLICKR_DOMAINS.includes(post.domain)) {
      return this.deps.flickr.getImageUrls(post.url);
    }

    return null;
  }

  private resolveGallery(post: RedditPost, log: Logger): ImageUrlCollection | null {
    const items = post.gallery_data?.items ?? [];
    const metadata = post.media_metadata ?? {};
    const urls: string[] = [];

    for (const { media_id: mediaId } of items) {
      const item = metadata[mediaId];
      if (item?.status !== 'valid') {
        log.warn(`Media item '${mediaId}' has status '${item?.status ?? 'missing'}'`);
        continue;
      }
      const url = galleryItemUrl(item);
      if (!url) {
        log.warn(`Media item '${mediaId}' has no source URL`);
        continue;
      }
      urls.push(url);
    }

    return urls.length > 0 ? { kind: 'gallery', urls } : null;
  }
}
