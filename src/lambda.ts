import 'dotenv/config';
import { loadConfig } from '@/config';
import type { Config, MastodonConfig } from '@/types/config';
import { buildWelcomeBot, type WelcomeBot } from '@/bootstrap';
import { MastodonService, type MastodonApi } from '@/services/mastodon';
import logger, { setLogLevel } from '@/utils/logger';

/**
 * Input of one scheduled invocation. A state machine feeds the previous
 * invocation's `output` back in, so `since_id` carries the cursor.
 */
export interface WelcomeEvent {
  since_id?: string | null;
}

export interface WelcomeHandlerResult {
  result: 'success';
  output: {
    since_id: string | null;
  };
}

export interface HandlerDependencies {
  loadConfig: () => Config;
  createClient: (config: MastodonConfig) => Promise<MastodonApi>;
}

const defaultDependencies: HandlerDependencies = {
  loadConfig: () => loadConfig(),
  createClient: (config) => MastodonService.create(config)
};

/**
 * Build a handler that runs a single pass per invocation. The authenticated
 * client and the seen set are created on the first call and reused while the
 * runtime keeps the handler warm.
 */
export function createHandler(deps: HandlerDependencies = defaultDependencies) {
  let bot: WelcomeBot | null = null;

  async function getBot(): Promise<WelcomeBot> {
    if (!bot) {
      const config = deps.loadConfig();
      setLogLevel(config.logging.level);
      const client = await deps.createClient(config.mastodon);
      bot = buildWelcomeBot(config, client);
    }
    return bot;
  }

  return async function handler(event: WelcomeEvent = {}): Promise<WelcomeHandlerResult> {
    const { runner, context } = await getBot();

    if (event.since_id) {
      context.sinceId = event.since_id;
    }

    await runner.initializeCursor(context);
    const result = await runner.runOnce(context);

    logger.debug('Invocation finished', {
      fetched: result.fetched,
      welcomed: result.decisions.length,
      sinceId: context.sinceId
    });

    return {
      result: 'success',
      output: {
        since_id: context.sinceId ?? null
      }
    };
  };
}

export const handler = createHandler();
