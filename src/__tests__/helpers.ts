import type { Post } from '@/types/post';
import type { MastodonApi, TimelinePage } from '@/services/mastodon';

/**
 * A public, top-level post by `authorId`. The handle defaults to the id.
 */
export function makePost(id: string, authorId: string | null, overrides: Partial<Post> = {}): Post {
  return {
    id,
    author: authorId === null ? undefined : { id: authorId, handle: authorId },
    createdAt: '2024-03-01T12:00:00.000Z',
    visibility: 'public',
    hashtags: ['introductions'],
    isReblog: false,
    ...overrides
  };
}

/**
 * A timeline page as `MastodonService` returns it. `rawCount` defaults to the
 * number of posts, i.e. nothing was dropped while mapping.
 */
export function timelinePage(posts: Post[], rawCount = posts.length): TimelinePage {
  return {
    posts,
    rawCount,
    oldestId: posts.length > 0 ? posts[posts.length - 1].id : undefined
  };
}

export function createMockApi(): jest.Mocked<MastodonApi> {
  return {
    fetchHashtagTimeline: jest.fn(),
    getMostRecentPostId: jest.fn(),
    publishReply: jest.fn(),
    healthCheck: jest.fn()
  };
}
