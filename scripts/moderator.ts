import { StopAfter } from './config';
import { count, createPostLogger, getVerbosity, log } from './logger';
import { RedditOAuthManager } from './reddit-oauth-manager';
import { buildResponse, ResponseTemplates } from './responses';
import { SubmissionStore } from './submission-store';
import { ClassifierContext, classifySubmission } from './submission-classifier';
import { ModeratorResult, PostResult, RedditPost } from './types';

const REDDIT_URL = 'https://www.reddit.com';

const MAX_RESULT_LENGTH = Math.max(...Object.values(PostResult).map((result) => result.length));

const RESULT_MARKERS: Partial<Record<PostResult, string>> = {
  [PostResult.MODPOST]: 'M',
  [PostResult.VALID]: '√',
  [PostResult.LARGER]: '!',
  [PostResult.UNSUPPORTED_MEDIA_TYPE]: '?',
};

export interface ModeratorContext {
  reddit: Pick<RedditOAuthManager, 'iterateNewPosts' | 'fetchSubmission'>;
  store: SubmissionStore;
  classifier: Omit<ClassifierContext, 'log'>;
  templates: ResponseTemplates;
  subreddit: string;
  dryRun: boolean;
  now?: () => Date;
}

export interface LoopOptions {
  count: number | null;
  stopAfter: StopAfter | null;
}

export type CheckOutcome = 'saved' | 'checked' | 'skipped';

export function formatStatusLine(result: PostResult, permalink: string, verbose: boolean): string {
  const marker = RESULT_MARKERS[result] ?? 'X';
  if (verbose) {
    return `[${marker}] ${result}`;
  }
  return `[${marker}] ${result.padEnd(MAX_RESULT_LENGTH)} - ${REDDIT_URL}${permalink}`;
}

function emptyResult(): ModeratorResult {
  return { processed: 0, saved: 0, skipped: 0, errors: 0 };
}

function tally(result: ModeratorResult, outcome: CheckOutcome): void {
  if (outcome === 'saved') result.saved++;
  if (outcome === 'skipped') result.skipped++;
}

/**
 * Classify one post, attach the moderator response and store it. Posts that
 * were already processed are skipped.
 */
export async function checkSubmission(post: RedditPost, context: ModeratorContext): Promise<CheckOutcome> {
  const postLog = createPostLogger(post.id);
  const verbose = getVerbosity() > 0;

  const processedAt = await context.store.findProcessed(post.id);
  if (processedAt) {
    if (verbose) {
      postLog.info(`[→] SKIPPED - Already processed on ${processedAt.toISOString()}`);
    } else {
      postLog.info(`[→] ${'SKIPPED'.padEnd(MAX_RESULT_LENGTH)} - ${REDDIT_URL}${post.permalink}`);
    }
    return 'skipped';
  }

  const classified = await classifySubmission(post, { ...context.classifier, log: postLog });
  const submission = {
    ...classified,
    response: buildResponse(classified, context.subreddit, context.templates),
  };

  postLog.info(formatStatusLine(submission.result, submission.permalink, verbose));

  if (context.dryRun) {
    postLog.detail('DRY RUN: not saving submission');
    return 'checked';
  }

  await context.store.save(submission, context.now ? context.now() : new Date());
  return 'saved';
}

function reachedStopDate(post: RedditPost, stopAfter: StopAfter | null): boolean {
  return stopAfter?.kind === 'date' && post.created_utc * 1000 <= stopAfter.date.getTime();
}

function reachedStopPost(post: RedditPost, stopAfter: StopAfter | null): boolean {
  return stopAfter?.kind === 'post' && post.id === stopAfter.postId;
}

export async function runLoop(context: ModeratorContext, options: LoopOptions): Promise<ModeratorResult> {
  const result = emptyResult();

  let message = options.count
    ? `Beginning retrieval of ${count(options.count, 'post')}`
    : 'Beginning maximum retrieval of posts';
  if (options.stopAfter?.kind === 'post') {
    message += `, stopping after post '${options.stopAfter.postId}'`;
  } else if (options.stopAfter?.kind === 'date') {
    message += `, stopping after ${options.stopAfter.date.toISOString()}`;
  }
  log('INFO', message);

  for await (const post of context.reddit.iterateNewPosts(context.subreddit)) {
    if (options.count && result.processed >= options.count) break;
    if (reachedStopDate(post, options.stopAfter)) break;

    result.processed++;
    try {
      tally(result, await checkSubmission(post, context));
    } catch (error) {
      log('ERROR', `Error processing post ${post.id}:`, error);
      result.errors++;
    }

    if (reachedStopPost(post, options.stopAfter)) break;
  }

  if (options.count) {
    log('INFO', `Finished retrieving ${count(options.count, 'post')}`);
  }
  return result;
}

export async function runSpecific(context: ModeratorContext, postIds: string[]): Promise<ModeratorResult> {
  const result = emptyResult();
  if (postIds.length === 0) {
    log('WARN', 'No post IDs to check');
    return result;
  }

  log('INFO', postIds.length === 1
    ? `Will only check post with this ID: ${postIds[0]}`
    : `Will only check posts with these IDs: ${postIds.join(', ')}`);

  for (const postId of postIds) {
    const postLog = createPostLogger(postId);
    result.processed++;
    try {
      postLog.detail('Retrieving post');
      const post = await context.reddit.fetchSubmission(postId);
      if (post.subreddit.toLowerCase() !== context.subreddit.toLowerCase()) {
        throw new Error(`Post ${postId} is from /r/${post.subreddit}, expected /r/${context.subreddit}`);
      }
      tally(result, await checkSubmission(post, context));
    } catch (error) {
      postLog.error(error instanceof Error ? error.message : String(error));
      result.errors++;
    }
  }
  return result;
}
