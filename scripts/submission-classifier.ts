import { createPostLogger, count, Logger } from './logger';
import { formatResolution, ReadonlyResolutionSet } from './resolution';
import { checkDeclaredResolutions } from './resolution-matcher';
import { validateImageDimensions } from './image-validator';
import { aggregateImageResults } from './result-aggregator';
import { parseTitle } from './title-parser';
import {
  DimensionLookup,
  ImageUrlCollection,
  PostResult,
  PostType,
  RedditPost,
  Submission,
  SubmissionImage,
} from './types';

export interface ClassifierContext {
  knownGood: ReadonlyResolutionSet;
  moderators: ReadonlySet<string>;
  resolveImageUrls: (post: RedditPost, log: Logger) => Promise<ImageUrlCollection | null>;
  fetchDimensions: (url: string) => Promise<DimensionLookup>;
  log?: Logger;
}

const DELETED_AUTHOR = '[deleted]';

/**
 * Classify one submission from its title and images. Early exits (moderator
 * posts, missing or unsupported title resolutions, unrecognised links) leave
 * the post with no images and type UNKNOWN.
 */
export async function classifySubmission(
  post: RedditPost,
  context: ClassifierContext,
): Promise<Submission> {
  const log = context.log ?? createPostLogger(post.id);
  const title = post.title.trim();
  const parsed = parseTitle(title, context.knownGood);
  const author = post.author === DELETED_AUTHOR ? null : post.author;

  log.detail(`Title: '${title}'`);
  log.detail(`Submitted: ${new Date(post.created_utc * 1000).toISOString()}`);
  log.detail(`Domain: ${post.domain}`);

  const submission: Submission = {
    postId: post.id,
    title,
    author,
    permalink: post.permalink,
    domain: post.domain,
    dateSubmitted: new Date(post.created_utc * 1000),
    resolutions: parsed.resolutions,
    titleTokens: parsed.tokens,
    goodResolutions: parsed.goodResolutions.values(),
    type: PostType.UNKNOWN,
    result: PostResult.VALID,
    specialSource: null,
    response: null,
    images: [],
  };

  if (author !== null && context.moderators.has(author)) {
    return { ...submission, result: PostResult.MODPOST };
  }

  const titleFailure = checkDeclaredResolutions(parsed.resolutions, parsed.goodResolutions);
  if (titleFailure) {
    return { ...submission, result: titleFailure };
  }

  const collection = await context.resolveImageUrls(post, log);
  const urls = collection === null ? [] : collection.kind === 'single' ? [collection.url] : collection.urls;
  if (collection === null || urls.length === 0) {
    return { ...submission, result: PostResult.UNSUPPORTED_TYPE_OR_LINK };
  }

  log.detail(`Resolution (title): ${parsed.resolutions.map(formatResolution).join(', ')}`);
  const source = collection.specialSource ? ` (${collection.specialSource})` : '';
  if (collection.kind === 'single') {
    log.detail(`Image submission${source}`);
  } else {
    log.detail(`Gallery submission${source} (${count(urls, 'image')})`);
  }

  const images: SubmissionImage[] = [];
  for (const [index, url] of urls.entries()) {
    const last = index === urls.length - 1;
    const branch = last ? '└─' : '├─';
    const debugBranch = last ? '   └─' : '│  └─';

    const lookup = await context.fetchDimensions(url);
    const check = validateImageDimensions(lookup, parsed.goodResolutions);

    if (lookup.ok) {
      log.detail(`${branch} Resolution (${lookup.format} image): ${lookup.width}×${lookup.height}`);
    } else {
      log.warn(`${branch} Unsupported MimeType '${lookup.contentType ?? 'unknown'}'`);
    }
    for (const comparison of check.comparisons) {
      const size = `${check.width}×${check.height}`;
      const declared = formatResolution(comparison.resolution);
      log.debug(
        comparison.atLeastAsLarge
          ? `${debugBranch} Image (${size}) at least as big as title's (${declared})`
          : `${debugBranch} Image (${size}) is smaller than title's (${declared})`,
      );
    }

    images.push({
      url,
      format: check.format,
      width: check.width,
      height: check.height,
      result: check.result,
    });
  }

  return {
    ...submission,
    type: collection.kind === 'single' ? PostType.IMAGE : PostType.GALLERY,
    specialSource: collection.specialSource ?? null,
    result: aggregateImageResults(images.map((image) => image.result)),
    images,
  };
}
