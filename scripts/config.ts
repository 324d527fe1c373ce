import * as dotenv from 'dotenv';
import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';

// Load environment variables
dotenv.config({ path: '.env.local' });

export const DEFAULT_CONFIG_PATH = path.join('config', 'moderator-config.json');

const FileConfigSchema = z.object({
  subreddit: z.string().min(1).optional(),
  wikiPage: z.string().min(1).default('resolutions'),
  api: z
    .object({
      requestTimeout: z.number().int().positive().default(10000),
    })
    .default({}),
  logging: z
    .object({
      verbose: z.number().int().min(0).default(0),
    })
    .default({}),
});

const EnvSchema = z.object({
  REDDIT_CLIENT_ID: z.string().min(1),
  REDDIT_CLIENT_SECRET: z.string().min(1),
  REDDIT_USER_AGENT: z.string().min(1),
  REDDIT_USERNAME: z.string().min(1),
  REDDIT_PASSWORD: z.string().min(1),
  IMGUR_CLIENT_ID: z.string().min(1),
  FLICKR_API_KEY: z.string().min(1),
  SUPABASE_URL: z.string().url(),
  SUPABASE_ANON_KEY: z.string().min(1),
});

export type StopAfter = { kind: 'post'; postId: string } | { kind: 'date'; date: Date };

export interface CliOptions {
  config?: string;
  subreddit?: string;
  count?: number;
  stopAfter?: StopAfter;
  verbose?: number;
  dryRun?: boolean;
}

export interface ModeratorConfig {
  subreddit: string;
  wikiPage: string;
  postIds: string[];
  count: number | null;
  stopAfter: StopAfter | null;
  verbose: number;
  dryRun: boolean;
  requestTimeout: number;
  reddit: {
    clientId: string;
    clientSecret: string;
    userAgent: string;
    username: string;
    password: string;
  };
  imgurClientId: string;
  flickrKey: string;
  supabase: {
    url: string;
    anonKey: string;
  };
}

export function normalizeSubreddit(name: string): string {
  return name.trim().replace(/^\/?r\//i, '');
}

const DATE_PATTERN =
  /^(?:(\d{4})\s*[-_/.,]\s*)?(\d{1,2})\s*[-_/.,]\s*(\d{1,2})(?:[\s,]\s*(\d{1,2})\s*[-_:.,]\s*(\d{2})(?:\s*[-_:.,]\s*(\d{2}))?)?$/i;

/**
 * Accepts a post ID ("a1b2c3d4") or a local timestamp
 * ("YYYY-MM-DD [HH:MM[:SS]]", year optional).
 */
export function parseStopAfter(value: string, now: Date = new Date()): StopAfter {
  const trimmed = value.trim();

  const date = DATE_PATTERN.exec(trimmed);
  if (date) {
    const [year, month, day, hours, minutes, seconds] = date
      .slice(1)
      .map((part, index) => (part === undefined ? (index === 0 ? now.getFullYear() : 0) : Number(part)));
    const daysInMonth = new Date(year, month, 0).getDate();
    const valid =
      month >= 1 && month <= 12 && day >= 1 && day <= daysInMonth && hours < 24 && minutes < 60 && seconds < 60;
    if (!valid) {
      throw new Error(`'${value}' doesn't look like a timestamp or a post ID`);
    }
    return { kind: 'date', date: new Date(year, month - 1, day, hours, minutes, seconds) };
  }

  if (/^[a-z0-9]+$/i.test(trimmed)) {
    return { kind: 'post', postId: trimmed };
  }

  throw new Error(`'${value}' doesn't look like a timestamp or a post ID`);
}

function loadConfigFile(configPath: string): z.infer<typeof FileConfigSchema> {
  const resolved = path.resolve(process.cwd(), configPath);
  if (!fs.existsSync(resolved)) {
    if (configPath === DEFAULT_CONFIG_PATH) {
      return FileConfigSchema.parse({});
    }
    throw new Error(`Config file not found: ${resolved}`);
  }

  const configData: unknown = JSON.parse(fs.readFileSync(resolved, 'utf8'));
  return FileConfigSchema.parse(configData);
}

export function loadConfig(
  postIds: string[],
  options: CliOptions,
  env: NodeJS.ProcessEnv = process.env,
): ModeratorConfig {
  const file = loadConfigFile(options.config ?? DEFAULT_CONFIG_PATH);

  const parsedEnv = EnvSchema.safeParse(env);
  if (!parsedEnv.success) {
    const missing = parsedEnv.error.issues.map((issue) => issue.path.join('.'));
    throw new Error(`Missing or invalid environment variables: ${missing.join(', ')}`);
  }
  const vars = parsedEnv.data;

  const subreddit = options.subreddit ?? file.subreddit;
  if (!subreddit) {
    throw new Error('A subreddit is required: pass --subreddit or set "subreddit" in the config file');
  }

  return {
    subreddit: normalizeSubreddit(subreddit),
    wikiPage: file.wikiPage,
    postIds,
    count: options.count ?? null,
    stopAfter: options.stopAfter ?? null,
    verbose: options.verbose ?? file.logging.verbose,
    dryRun: options.dryRun ?? false,
    requestTimeout: file.api.requestTimeout,
    reddit: {
      clientId: vars.REDDIT_CLIENT_ID,
      clientSecret: vars.REDDIT_CLIENT_SECRET,
      userAgent: vars.REDDIT_USER_AGENT,
      username: vars.REDDIT_USERNAME,
      password: vars.REDDIT_PASSWORD,
    },
    imgurClientId: vars.IMGUR_CLIENT_ID,
    flickrKey: vars.FLICKR_API_KEY,
    supabase: {
      url: vars.SUPABASE_URL,
      anonKey: vars.SUPABASE_ANON_KEY,
    },
  };
}
