import type { Config } from '@/types/config';
import { createWelcomeContext, type WelcomeContext } from '@/core/context';
import type { MastodonApi } from '@/services/mastodon';
import { ReplyService } from '@/services/reply';
import { MetricsService } from '@/services/metrics';
import { WelcomeRunner } from '@/services/runner';

export interface WelcomeBot {
  context: WelcomeContext;
  runner: WelcomeRunner;
  replyService: ReplyService;
  metrics: MetricsService;
}

/**
 * Wire the services for one bot from validated config and an authenticated
 * API client. Shared by the CLI and the serverless handler.
 */
export function buildWelcomeBot(config: Config, mastodon: MastodonApi): WelcomeBot {
  const metrics = new MetricsService();
  const replyService = new ReplyService(mastodon, {
    template: config.bot.welcomeTemplate,
    visibility: config.bot.replyVisibility
  });
  const runner = new WelcomeRunner(mastodon, replyService, metrics, {
    batchSize: config.bot.batchSize,
    localOnly: config.bot.localOnly,
    introductionsOnly: config.bot.introductionsOnly,
    dryRun: config.bot.dryRun
  });

  return {
    context: createWelcomeContext(config.bot.hashtag, config.bot.sinceId),
    runner,
    replyService,
    metrics
  };
}
