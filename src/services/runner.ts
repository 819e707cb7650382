import type { MastodonApi } from './mastodon';
import { ReplyService } from './reply';
import { MetricsService } from './metrics';
import type { WelcomeContext } from '@/core/context';
import { decideWelcomes, isIntroduction, type WelcomeDecision } from '@/core/welcome-decision';
import type { Post } from '@/types/post';
import logger from '@/utils/logger';
import { toErrorMessage } from '@/utils/text';

export interface RunnerOptions {
  batchSize: number;
  localOnly: boolean;
  introductionsOnly: boolean;
  dryRun: boolean;
}

export interface PassResult {
  fetched: number;
  decisions: WelcomeDecision[];
  // Author ids, in decision order
  sent: string[];
  simulated: string[];
  failed: string[];
  sinceId?: string;
}

export class WelcomeRunner {
  constructor(
    private mastodon: MastodonApi,
    private replyService: ReplyService,
    private metrics: MetricsService,
    private options: RunnerOptions
  ) {}

  /**
   * Without a known cursor, start after the most recent post so the first
   * pass does not greet the whole backlog.
   */
  async initializeCursor(context: WelcomeContext): Promise<void> {
    if (context.sinceId) {
      return;
    }

    logger.info(`Getting most recent post for #${context.hashtag}`);
    context.sinceId = await this.mastodon.getMostRecentPostId(context.hashtag, this.options.localOnly);

    if (context.sinceId) {
      logger.info(`Most recent post is "${context.sinceId}"`);
    } else {
      logger.info('Found no posts, starting from the beginning of the timeline');
    }
  }

  /**
   * One fetch-decide-post pass. A fetch failure rejects and leaves both the
   * cursor and the seen set untouched; a failed reply is logged and the
   * remaining authors are still attempted.
   */
  async runOnce(context: WelcomeContext): Promise<PassResult> {
    const stopTimer = this.metrics.startPassTimer();

    try {
      const result = await this.runPass(context);
      this.metrics.incrementPasses('completed');
      return result;
    } catch (error) {
      this.metrics.incrementPasses('failed');
      logger.error(`Pass for #${context.hashtag} failed: ${toErrorMessage(error)}`);
      throw error;
    } finally {
      stopTimer();
    }
  }

  private async runPass(context: WelcomeContext): Promise<PassResult> {
    logger.info(`Checking #${context.hashtag} since "${context.sinceId ?? 'the beginning'}"`);

    const posts = await this.fetchNewPosts(context);
    this.metrics.incrementPostsFetched(posts.length);

    // Timeline pages are newest first; welcome in the order people posted
    const chronological = [...posts].reverse();
    const eligible = this.options.introductionsOnly
      ? chronological.filter(isIntroduction)
      : chronological;

    const decisions = decideWelcomes(eligible, context.seen, (handle) => this.replyService.compose(handle));
    this.metrics.setSeenAuthors(context.seen.size);

    const sent: string[] = [];
    const simulated: string[] = [];
    const failed: string[] = [];

    for (const decision of decisions) {
      if (this.options.dryRun) {
        logger.info(`Would have welcomed @${decision.authorHandle} in reply to "${decision.postId}"`, {
          message: decision.message
        });
        simulated.push(decision.authorId);
        this.metrics.incrementWelcomes('dry_run');
        continue;
      }

      try {
        await this.replyService.publish(decision);
        sent.push(decision.authorId);
        this.metrics.incrementWelcomes('sent');
      } catch (error) {
        failed.push(decision.authorId);
        this.metrics.incrementWelcomes('failed');
        logger.error(`Failed to welcome @${decision.authorHandle}`, {
          authorId: decision.authorId,
          postId: decision.postId,
          error: toErrorMessage(error)
        });
      }
    }

    if (posts.length > 0) {
      context.sinceId = posts[0].id;
    }

    logger.info(`Pass done: ${posts.length} post(s), ${decisions.length} new author(s)`, {
      sent: sent.length,
      simulated: simulated.length,
      failed: failed.length,
      sinceId: context.sinceId
    });

    return {
      fetched: posts.length,
      decisions,
      sent,
      simulated,
      failed,
      sinceId: context.sinceId
    };
  }

  /**
   * Every post newer than the cursor, newest first. Pages backwards with
   * max_id until a short page signals the cursor has been reached.
   */
  private async fetchNewPosts(context: WelcomeContext): Promise<Post[]> {
    const { batchSize, localOnly } = this.options;
    const collected: Post[] = [];
    const seenIds = new Set<string>();
    let maxId: string | undefined;

    for (;;) {
      logger.debug(`Attempting to fetch ${batchSize} post(s)`, { maxId });
      const page = await this.mastodon.fetchHashtagTimeline(context.hashtag, {
        sinceId: context.sinceId,
        maxId,
        limit: batchSize,
        local: localOnly
      });

      for (const post of page.posts) {
        if (!seenIds.has(post.id)) {
          seenIds.add(post.id);
          collected.push(post);
        }
      }

      // Count what the server sent: a dropped entry must not end paging early
      if (page.rawCount < batchSize) {
        break;
      }

      const { oldestId } = page;
      if (!oldestId || oldestId === maxId) {
        // No id to page from, or the server ignored max_id and sent the same page
        break;
      }
      maxId = oldestId;
    }

    return collected;
  }
}
