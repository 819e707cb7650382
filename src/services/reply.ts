import type { MastodonApi, PublishReplyResult } from './mastodon';
import type { WelcomeDecision } from '@/core/welcome-decision';
import type { Visibility } from '@/types/config';
import logger from '@/utils/logger';
import { truncateText } from '@/utils/text';

// Default status length limit of a Mastodon instance
export const MAX_STATUS_LENGTH = 500;

export interface ReplyOptions {
  template: string;
  visibility: Visibility;
}

export class ReplyService {
  constructor(
    private mastodon: MastodonApi,
    private options: ReplyOptions
  ) {}

  compose(handle: string): string {
    const mention = handle.startsWith('@') ? handle : `@${handle}`;
    return truncateText(this.options.template.replaceAll('{handle}', mention), MAX_STATUS_LENGTH);
  }

  async publish(decision: WelcomeDecision): Promise<PublishReplyResult> {
    const result = await this.mastodon.publishReply({
      inReplyToId: decision.postId,
      status: decision.message,
      visibility: this.options.visibility,
      // Lets the instance drop a duplicate if the same welcome is sent twice
      idempotencyKey: `welcome-${decision.authorId}`
    });

    logger.info('Welcome reply published', {
      authorId: decision.authorId,
      handle: decision.authorHandle,
      inReplyToId: decision.postId,
      replyId: result.id
    });

    return result;
  }
}
