import { Command, InvalidArgumentError } from 'commander';
import { CliOptions, DEFAULT_CONFIG_PATH, loadConfig, parseStopAfter, StopAfter } from './config';
import { FlickrClient } from './flickr-client';
import { fetchImageDimensions } from './image-metadata';
import { ImageUrlResolver } from './image-url-resolver';
import { ImgurClient } from './imgur-client';
import { log, setVerbosity } from './logger';
import { ModeratorContext, runLoop, runSpecific } from './moderator';
import { RedditOAuthManager } from './reddit-oauth-manager';
import { loadKnownGoodResolutions } from './resolution-wiki';
import { loadResponseTemplates } from './responses';
import { SupabaseSubmissionStore } from './submission-store';

const VERSION = '0.1.0';

function parseCount(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

function parseStopAfterOption(value: string): StopAfter {
  try {
    return parseStopAfter(value);
  } catch (error) {
    throw new InvalidArgumentError(error instanceof Error ? error.message : String(error));
  }
}

async function main(postIds: string[], options: CliOptions): Promise<void> {
  const config = loadConfig(postIds, options);
  setVerbosity(config.verbose);

  log('INFO', `🚀 Starting wallpaper moderator v${VERSION} for /r/${config.subreddit}`);
  if (config.dryRun) {
    log('WARN', 'DRY RUN: submissions will be classified but not saved');
  }

  const reddit = new RedditOAuthManager(config.reddit, config.requestTimeout);
  const userInfo = await reddit.verifyAuthentication();
  if (!userInfo) {
    throw new Error('Reddit authentication failed. Check REDDIT_USERNAME and REDDIT_PASSWORD.');
  }
  log('INFO', `Authenticated as Reddit user: u/${userInfo.username}`);

  const knownGood = await loadKnownGoodResolutions(reddit, config.subreddit, config.wikiPage);
  const moderators = await reddit.fetchModerators(config.subreddit);
  log('INFO', `Loaded ${moderators.size} moderators of /r/${config.subreddit}`);

  const resolver = new ImageUrlResolver({
    fetchSubmission: (postId) => reddit.fetchSubmission(postId),
    imgur: new ImgurClient(config.imgurClientId, config.requestTimeout),
    flickr: new FlickrClient(config.flickrKey, config.requestTimeout),
  });

  const context: ModeratorContext = {
    reddit,
    store: SupabaseSubmissionStore.fromCredentials(config.supabase.url, config.supabase.anonKey),
    classifier: {
      knownGood,
      moderators,
      resolveImageUrls: (post, postLog) => resolver.resolve(post, postLog),
      fetchDimensions: (url) => fetchImageDimensions(url, config.requestTimeout),
    },
    templates: loadResponseTemplates(),
    subreddit: config.subreddit,
    dryRun: config.dryRun,
  };

  const startTime = Date.now();
  const result = config.postIds.length > 0
    ? await runSpecific(context, config.postIds)
    : await runLoop(context, { count: config.count, stopAfter: config.stopAfter });
  const totalTime = Math.round((Date.now() - startTime) / 1000);

  log('INFO', '🎉 Moderator run completed');
  log('INFO', `📊 Summary: ${result.processed} processed, ${result.saved} saved, ${result.skipped} skipped, ${result.errors} errors in ${totalTime}s`);
}

export function createProgram(): Command {
  return new Command()
    .name('wallpaper-moderator')
    .description('Validates that wallpaper submissions match the resolution in their title')
    .version(VERSION)
    .argument('[postIds...]', 'If present, one or more specific posts to evaluate instead of walking /new')
    .option('-c, --config <path>', 'Config file', DEFAULT_CONFIG_PATH)
    .option('-r, --subreddit <name>', 'Subreddit to operate upon')
    .option('-n, --count <n>', 'Stop after the Nth post', parseCount)
    .option('-s, --stop-after <idOrDate>', 'Stop after a post ID (a1b2c3d4) or timestamp (YYYY-MM-DD [HH:MM[:SS]])', parseStopAfterOption)
    .option('-v, --verbose', 'Increase output detail (repeatable)', (_value: string, previous: number | undefined) => (previous ?? 0) + 1)
    .option('--dry-run', 'Classify and log submissions without saving them')
    .action((postIds: string[], options: CliOptions) => main(postIds, options));
}

// Run if called directly
if (require.main === module) {
  createProgram()
    .parseAsync(process.argv)
    .then(() => {
      log('INFO', 'Moderator finished successfully');
      process.exit(0);
    })
    .catch((error: unknown) => {
      log('ERROR', 'Moderator failed:', error);
      process.exit(1);
    });
}
