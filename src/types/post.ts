import { z } from 'zod';

/**
 * Account fields the bot relies on. `id` is the stable key used for
 * deduplication; `acct` is the display handle and can change.
 */
export const AccountSchema = z.object({
  id: z.string().min(1),
  username: z.string(),
  acct: z.string().min(1)
});

export const TagSchema = z.object({
  name: z.string().min(1)
});

/**
 * Status as returned by the timeline endpoints. Only `id` is required: a
 * malformed optional field falls back to its empty value so the status still
 * maps to a Post. `account` and `tags` are validated separately.
 */
export const StatusSchema = z.object({
  id: z.string().min(1),
  created_at: z.string().optional().catch(undefined),
  visibility: z.string().optional().catch(undefined),
  url: z.string().nullish().catch(undefined),
  in_reply_to_id: z.string().nullish().catch(undefined),
  in_reply_to_account_id: z.string().nullish().catch(undefined),
  reblog: z.unknown().optional(),
  account: z.unknown().optional(),
  tags: z.array(z.unknown()).catch([])
});

export const TokenResponseSchema = z.object({
  access_token: z.string().min(1),
  token_type: z.string().optional(),
  scope: z.string().optional(),
  created_at: z.number().optional()
});

export const ApiErrorBodySchema = z.object({
  error: z.string(),
  error_description: z.string().optional()
});

export interface PostAuthor {
  id: string;
  handle: string;
}

/**
 * A hashtag timeline entry. Immutable once fetched.
 */
export interface Post {
  id: string;
  author?: PostAuthor;
  createdAt?: string;
  visibility?: string;
  url?: string;
  hashtags: string[];
  isReblog: boolean;
  inReplyToId?: string;
  inReplyToAccountId?: string;
}
