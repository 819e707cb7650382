import type { Post } from '@/types/post';
import { SeenAuthorTracker } from '@/core/seen-authors';
import logger from '@/utils/logger';

export interface WelcomeDecision {
  authorId: string;
  authorHandle: string;
  // The author's first post in the batch; the reply is threaded under it
  postId: string;
  message: string;
}

export type MessageComposer = (handle: string) => string;

/**
 * True for a public, original, top-level post: the kind of post a newcomer
 * writes to introduce themselves. Boosts and replies inside the hashtag are
 * conversation, not introductions.
 */
export function isIntroduction(post: Post): boolean {
  return post.visibility === 'public' &&
    !post.isReblog &&
    post.inReplyToId === undefined &&
    post.inReplyToAccountId === undefined;
}

/**
 * Decide which authors in `posts` get a welcome.
 *
 * Single pass in input order. An author not yet in `seen` and not already
 * picked from this batch yields one decision for their first post and is
 * added to `seen` immediately, before any reply is attempted. Posts without
 * a usable author are dropped.
 */
export function decideWelcomes(
  posts: readonly Post[],
  seen: SeenAuthorTracker,
  compose: MessageComposer
): WelcomeDecision[] {
  const batchSeen = new Set<string>();
  const decisions: WelcomeDecision[] = [];

  for (const post of posts) {
    const author = post.author;
    if (!author || author.id.length === 0 || author.handle.length === 0) {
      logger.debug('Skipping post without an author', { postId: post.id });
      continue;
    }

    if (seen.has(author.id) || batchSeen.has(author.id)) {
      continue;
    }

    batchSeen.add(author.id);
    seen.add(author.id);

    decisions.push({
      authorId: author.id,
      authorHandle: author.handle,
      postId: post.id,
      message: compose(author.handle)
    });
  }

  return decisions;
}
