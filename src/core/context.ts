import { SeenAuthorTracker } from '@/core/seen-authors';
import { normalizeHashtag } from '@/utils/text';

/**
 * State owned by whoever drives the passes (the CLI poller or the serverless
 * handler) and threaded through the runner.
 */
export interface WelcomeContext {
  hashtag: string;
  // Only posts newer than this id are fetched; advanced after each pass
  sinceId?: string;
  seen: SeenAuthorTracker;
}

export function createWelcomeContext(hashtag: string, sinceId?: string, seen = new SeenAuthorTracker()): WelcomeContext {
  return {
    hashtag: normalizeHashtag(hashtag),
    sinceId,
    seen
  };
}
