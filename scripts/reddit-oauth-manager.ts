import { z } from 'zod';
import { log } from './logger';
import { RedditPost, RedditPostSchema } from './types';

const REDDIT_API_URL = 'https://oauth.reddit.com';
const TOKEN_URL = 'https://www.reddit.com/api/v1/access_token';

export interface RedditCredentials {
  clientId: string;
  clientSecret: string;
  userAgent: string;
  username: string;
  password: string;
}

interface TokenInfo {
  access_token: string;
  expires_at: number; // Unix timestamp
  token_type: string;
  scope: string;
}

const TokenResponseSchema = z.object({
  access_token: z.string().min(1),
  expires_in: z.number(),
  token_type: z.string(),
  scope: z.string(),
});

const ListingSchema = z.object({
  data: z.object({
    after: z.string().nullable(),
    children: z.array(z.object({ kind: z.string(), data: RedditPostSchema })),
  }),
});

const ModeratorListSchema = z.object({
  data: z.object({
    children: z.array(z.object({ name: z.string() })),
  }),
});

const WikiPageSchema = z.object({
  data: z.object({
    content_md: z.string(),
  }),
});

const UserInfoSchema = z.object({
  name: z.string(),
  id: z.string(),
});

export interface PostPage {
  posts: RedditPost[];
  after: string | null;
}

class RedditOAuthManager {
  private currentToken: TokenInfo | null = null;

  constructor(
    private readonly credentials: RedditCredentials,
    private readonly requestTimeout = 10000,
  ) {}

  /**
   * Get a valid access token, refreshing if necessary
   */
  async getAccessToken(): Promise<string> {
    // Token is still valid (with 60 second buffer)
    if (this.currentToken && this.currentToken.expires_at > Date.now() / 1000 + 60) {
      return this.currentToken.access_token;
    }

    this.currentToken = await this.requestAccessToken();
    return this.currentToken.access_token;
  }

  /**
   * Password grant for a "script" type app
   */
  private async requestAccessToken(): Promise<TokenInfo> {
    const { clientId, clientSecret, userAgent, username, password } = this.credentials;
    const auth = Buffer.from(`${clientId}:${clientSecret}`).toString('base64');

    const response = await fetch(TOKEN_URL, {
      method: 'POST',
      headers: {
        'Authorization': `Basic ${auth}`,
        'Content-Type': 'application/x-www-form-urlencoded',
        'User-Agent': userAgent,
      },
      body: new URLSearchParams({
        grant_type: 'password',
        username,
        password,
      }),
      signal: AbortSignal.timeout(this.requestTimeout),
    });

    if (!response.ok) {
      const errorText = await response.text();
      log('ERROR', `Token request failed: ${response.status}`, errorText);
      throw new Error(`Token request failed: ${response.status}`);
    }

    const body: unknown = await response.json();
    const parsed = TokenResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new Error('No access token received from Reddit API');
    }

    const expiresAt = Math.floor(Date.now() / 1000) + parsed.data.expires_in;
    log('DEBUG', `Access token refreshed, expires at ${new Date(expiresAt * 1000).toISOString()}`);

    return {
      access_token: parsed.data.access_token,
      expires_at: expiresAt,
      token_type: parsed.data.token_type,
      scope: parsed.data.scope,
    };
  }

  /**
   * Make an authenticated request to Reddit API
   */
  async makeAuthenticatedRequest(url: string, options: RequestInit = {}): Promise<Response> {
    const accessToken = await this.getAccessToken();

    return fetch(url, {
      ...options,
      headers: {
        ...options.headers,
        'Authorization': `Bearer ${accessToken}`,
        'User-Agent': this.credentials.userAgent,
      },
      signal: options.signal ?? AbortSignal.timeout(this.requestTimeout),
    });
  }

  private async getJson<T>(pathAndQuery: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
    const response = await this.makeAuthenticatedRequest(`${REDDIT_API_URL}${pathAndQuery}`);
    if (!response.ok) {
      throw new Error(`Reddit API error for ${pathAndQuery}: status ${response.status}`);
    }

    const body: unknown = await response.json();
    return schema.parse(body);
  }

  async fetchNewPosts(subreddit: string, after: string | null = null, limit = 100): Promise<PostPage> {
    const params = new URLSearchParams({ limit: String(limit), raw_json: '1' });
    if (after) params.set('after', after);

    const listing = await this.getJson(`/r/${subreddit}/new?${params.toString()}`, ListingSchema);
    return {
      posts: listing.data.children.map((child) => child.data),
      after: listing.data.after,
    };
  }

  /**
   * Walk /new from the newest post until Reddit runs out of pages
   */
  async *iterateNewPosts(subreddit: string): AsyncGenerator<RedditPost> {
    let after: string | null = null;
    do {
      const page = await this.fetchNewPosts(subreddit, after);
      yield* page.posts;
      after = page.after;
    } while (after);
  }

  async fetchSubmission(postId: string): Promise<RedditPost> {
    const listing = await this.getJson(`/by_id/t3_${postId}?raw_json=1`, ListingSchema);
    const [child] = listing.data.children;
    if (!child) {
      throw new Error(`Post ${postId} not found`);
    }
    return child.data;
  }

  async fetchModerators(subreddit: string): Promise<Set<string>> {
    const list = await this.getJson(`/r/${subreddit}/about/moderators`, ModeratorListSchema);
    return new Set(list.data.children.map((moderator) => moderator.name));
  }

  async fetchWikiPage(subreddit: string, page: string): Promise<string> {
    const wiki = await this.getJson(`/r/${subreddit}/wiki/${page}`, WikiPageSchema);
    return wiki.data.content_md;
  }

  /**
   * Verify authentication by getting current user info
   */
  async verifyAuthentication(): Promise<{ username: string; id: string } | null> {
    try {
      const userInfo = await this.getJson('/api/v1/me', UserInfoSchema);
      return { username: userInfo.name, id: userInfo.id };
    } catch (error) {
      log('ERROR', 'Error verifying authentication:', error);
      return null;
    }
  }
}

export { RedditOAuthManager };
