import {
  AccountSchema,
  ApiErrorBodySchema,
  StatusSchema,
  TagSchema,
  TokenResponseSchema,
  type Post
} from '@/types/post';
import type { MastodonConfig, Visibility } from '@/types/config';
import { AuthenticationError, FetchError, PostError, WelcomeBotError } from '@/core/errors';
import { normalizeHashtag, toErrorMessage } from '@/utils/text';
import logger from '@/utils/logger';

export interface TimelineQuery {
  sinceId?: string;
  maxId?: string;
  limit: number;
  local: boolean;
}

/**
 * One page of a timeline. `rawCount` and `oldestId` describe what the server
 * sent, before entries without an id were dropped, so callers can page on
 * them.
 */
export interface TimelinePage {
  posts: Post[];
  rawCount: number;
  oldestId?: string;
}

export interface PublishReplyOptions {
  inReplyToId: string;
  status: string;
  visibility: Visibility;
  idempotencyKey?: string;
}

export interface PublishReplyResult {
  id: string;
  url?: string;
}

/**
 * The API operations the welcome bot consumes. `MastodonService` is the
 * network implementation; tests substitute their own.
 */
export interface MastodonApi {
  fetchHashtagTimeline(hashtag: string, query: TimelineQuery): Promise<TimelinePage>;
  getMostRecentPostId(hashtag: string, local: boolean): Promise<string | undefined>;
  publishReply(options: PublishReplyOptions): Promise<PublishReplyResult>;
  healthCheck(): Promise<boolean>;
}

type ErrorFactory = (message: string, options: { cause?: unknown; status?: number }) => WelcomeBotError;

/**
 * Map a raw status to a Post. Returns null only when the status has no id;
 * a missing or malformed account leaves `author` unset.
 */
export function toPost(raw: unknown): Post | null {
  const parsed = StatusSchema.safeParse(raw);
  if (!parsed.success) {
    return null;
  }

  const status = parsed.data;
  const account = AccountSchema.safeParse(status.account);

  return {
    id: status.id,
    author: account.success ? { id: account.data.id, handle: account.data.acct } : undefined,
    createdAt: status.created_at,
    visibility: status.visibility,
    url: status.url ?? undefined,
    hashtags: status.tags.flatMap((raw) => {
      const tag = TagSchema.safeParse(raw);
      return tag.success ? [tag.data.name.toLowerCase()] : [];
    }),
    isReblog: status.reblog !== undefined && status.reblog !== null,
    inReplyToId: status.in_reply_to_id ?? undefined,
    inReplyToAccountId: status.in_reply_to_account_id ?? undefined
  };
}

export class MastodonService implements MastodonApi {
  private accessToken: string | null = null;
  private readonly apiBaseUrl: string;

  /**
   * Authenticate with the OAuth2 password grant and return a ready client.
   * Throws AuthenticationError when no token could be obtained.
   */
  static async create(config: MastodonConfig): Promise<MastodonService> {
    const service = new MastodonService(config.apiBaseUrl);
    await service.authenticate(config);
    return service;
  }

  private constructor(apiBaseUrl: string) {
    this.apiBaseUrl = apiBaseUrl;
  }

  private async authenticate(config: MastodonConfig): Promise<void> {
    logger.info('Authenticating with the API', {
      apiBaseUrl: this.apiBaseUrl,
      clientId: config.clientId,
      username: config.username
    });

    const body = new URLSearchParams({
      grant_type: 'password',
      username: config.username,
      password: config.password,
      client_id: config.clientId,
      client_secret: config.clientSecret,
      scope: config.scopes.join(' ')
    });

    const data = await this.request(
      this.buildUrl('/oauth/token'),
      {
        method: 'POST',
        headers: {
          'Accept': 'application/json',
          'Content-Type': 'application/x-www-form-urlencoded'
        },
        body: body.toString()
      },
      'Token request',
      (message, options) => new AuthenticationError(message, options)
    );

    const token = TokenResponseSchema.safeParse(data);
    if (!token.success) {
      throw new AuthenticationError('Token response did not contain an access token');
    }

    this.accessToken = token.data.access_token;
    logger.info('Successfully logged in', { scope: token.data.scope });
  }

  async fetchHashtagTimeline(hashtag: string, query: TimelineQuery): Promise<TimelinePage> {
    const url = this.buildUrl(`/api/v1/timelines/tag/${encodeURIComponent(normalizeHashtag(hashtag))}`);
    url.searchParams.set('limit', query.limit.toString());
    if (query.local) {
      url.searchParams.set('local', 'true');
    }
    if (query.sinceId) {
      url.searchParams.set('since_id', query.sinceId);
    }
    if (query.maxId) {
      url.searchParams.set('max_id', query.maxId);
    }

    logger.debug('Fetching hashtag timeline', { url: url.toString() });

    const data = await this.request(
      url,
      { headers: this.authHeaders() },
      'Timeline request',
      (message, options) => new FetchError(message, options)
    );

    if (!Array.isArray(data)) {
      throw new FetchError('Timeline response was not a list of statuses');
    }

    const posts: Post[] = [];
    for (const raw of data) {
      const post = toPost(raw);
      if (!post) {
        logger.warn('Skipping timeline entry without a status id');
        continue;
      }
      posts.push(post);
    }

    logger.debug(`Received ${posts.length} post(s) for #${normalizeHashtag(hashtag)}`, { rawCount: data.length });
    return {
      posts,
      rawCount: data.length,
      oldestId: posts.length > 0 ? posts[posts.length - 1].id : undefined
    };
  }

  async getMostRecentPostId(hashtag: string, local: boolean): Promise<string | undefined> {
    const { posts } = await this.fetchHashtagTimeline(hashtag, { limit: 1, local });
    return posts.length > 0 ? posts[0].id : undefined;
  }

  async publishReply(options: PublishReplyOptions): Promise<PublishReplyResult> {
    const headers: Record<string, string> = {
      ...this.authHeaders(),
      'Content-Type': 'application/json'
    };
    if (options.idempotencyKey) {
      headers['Idempotency-Key'] = options.idempotencyKey;
    }

    const data = await this.request(
      this.buildUrl('/api/v1/statuses'),
      {
        method: 'POST',
        headers,
        body: JSON.stringify({
          status: options.status,
          in_reply_to_id: options.inReplyToId,
          visibility: options.visibility
        })
      },
      'Status request',
      (message, errorOptions) => new PostError(message, errorOptions)
    );

    const created = StatusSchema.safeParse(data);
    if (!created.success) {
      throw new PostError('Status response did not contain a status id');
    }

    return { id: created.data.id, url: created.data.url ?? undefined };
  }

  async healthCheck(): Promise<boolean> {
    return this.accessToken !== null;
  }

  private buildUrl(pathname: string): URL {
    return new URL(pathname, this.apiBaseUrl);
  }

  private authHeaders(): Record<string, string> {
    if (!this.accessToken) {
      throw new AuthenticationError('Not authenticated. Use MastodonService.create() to log in first.');
    }
    return {
      'Accept': 'application/json',
      'Authorization': `Bearer ${this.accessToken}`
    };
  }

  /**
   * Perform a request and return the parsed JSON body. Every failure is
   * raised through `fail` so callers get the error class for their step.
   */
  private async request(url: URL, init: RequestInit, label: string, fail: ErrorFactory): Promise<unknown> {
    let response: Response;
    try {
      response = await fetch(url, init);
    } catch (error) {
      throw fail(`${label} to ${url.origin} failed: ${toErrorMessage(error)}`, { cause: error });
    }

    if (!response.ok) {
      const detail = await this.describeFailure(response);
      throw fail(`${label} returned ${response.status}: ${detail}`, { status: response.status });
    }

    try {
      return await response.json();
    } catch (error) {
      throw fail(`${label} returned invalid JSON`, { cause: error, status: response.status });
    }
  }

  private async describeFailure(response: Response): Promise<string> {
    let text: string;
    try {
      text = await response.text();
    } catch (error) {
      return response.statusText || toErrorMessage(error);
    }

    let body: unknown;
    try {
      body = JSON.parse(text);
    } catch {
      return text.trim() || response.statusText;
    }

    const parsed = ApiErrorBodySchema.safeParse(body);
    if (parsed.success) {
      return parsed.data.error_description ?? parsed.data.error;
    }
    return response.statusText;
  }
}
