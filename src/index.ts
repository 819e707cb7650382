#!/usr/bin/env node
import 'dotenv/config';
import type { Server } from 'http';

import { loadConfig } from '@/config';
import { formatUsage, parseCliArgs } from '@/config/cli';
import type { Config, MastodonConfig } from '@/types/config';
import { AuthenticationError, ConfigurationError } from '@/core/errors';
import { buildWelcomeBot, type WelcomeBot } from '@/bootstrap';
import { MastodonService, type MastodonApi } from '@/services/mastodon';
import { HashtagPoller } from '@/services/poller';
import { createApp } from '@/api/app';
import logger, { flushLogger, setLogLevel } from '@/utils/logger';

export type ClientFactory = (config: MastodonConfig) => Promise<MastodonApi>;

const createMastodonClient: ClientFactory = (config) => MastodonService.create(config);

class WelcomeBotServer {
  private bot: WelcomeBot | null = null;
  private poller: HashtagPoller | null = null;
  private server: Server | null = null;

  constructor(
    private config: Config,
    private createClient: ClientFactory = createMastodonClient
  ) {}

  async start(): Promise<void> {
    const { bot: botConfig } = this.config;

    logger.info('Starting hashtag welcome bot', {
      apiBaseUrl: this.config.mastodon.apiBaseUrl,
      hashtag: botConfig.hashtag,
      dryRun: botConfig.dryRun,
      batchSize: botConfig.batchSize
    });

    // Authentication failure is fatal; it propagates to main()
    const mastodon = await this.createClient(this.config.mastodon);
    this.bot = buildWelcomeBot(this.config, mastodon);

    if (botConfig.once) {
      await this.bot.runner.initializeCursor(this.bot.context);
      await this.bot.runner.runOnce(this.bot.context);
      return;
    }

    // The poller looks up the starting cursor in its first pass
    this.poller = new HashtagPoller(this.bot.runner, this.bot.context, botConfig.pollIntervalSeconds);

    if (this.config.server.enabled) {
      await this.startHttpServer(this.bot, mastodon, this.poller);
    }

    await this.poller.start();
  }

  private async startHttpServer(bot: WelcomeBot, mastodon: MastodonApi, poller: HashtagPoller): Promise<void> {
    const app = createApp({
      services: {
        mastodon,
        poller,
        metrics: bot.metrics
      },
      metrics: bot.metrics,
      getStatus: () => poller.getStatus()
    });

    const { host, port } = this.config.server;
    await new Promise<void>((resolve, reject) => {
      const server = app.listen(port, host, () => {
        logger.info(`HTTP server listening on ${host}:${port}`);
        resolve();
      });
      server.on('error', (error: Error) => {
        logger.error('HTTP server error:', error);
        reject(error);
      });
      this.server = server;
    });
  }

  async stop(): Promise<void> {
    logger.info('Stopping hashtag welcome bot...');

    if (this.poller) {
      await this.poller.stop();
    }

    const server = this.server;
    if (server) {
      await new Promise<void>((resolve) => {
        server.close(() => resolve());
      });
      this.server = null;
    }

    logger.info('Hashtag welcome bot stopped');
  }
}

// Exit once winston has flushed its file transports
function exitAfterFlush(code: number): void {
  flushLogger().then(
    () => process.exit(code),
    () => process.exit(code)
  );
}

function setupSignalHandlers(server: WelcomeBotServer): void {
  const signals: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];

  signals.forEach((signal) => {
    process.on(signal, () => {
      logger.info(`Received ${signal}, finishing the current pass and shutting down...`);
      server.stop()
        .then(() => exitAfterFlush(0))
        .catch((error: unknown) => {
          logger.error('Error during shutdown:', error);
          exitAfterFlush(1);
        });
    });
  });

  process.on('uncaughtException', (error) => {
    logger.error('Uncaught exception:', error);
    process.exit(1);
  });

  process.on('unhandledRejection', (reason) => {
    logger.error('Unhandled rejection:', reason);
    process.exit(1);
  });
}

async function main(argv: string[]): Promise<void> {
  if (parseCliArgs(argv).help) {
    console.log(formatUsage());
    return;
  }

  const config = loadConfig({ argv });
  setLogLevel(config.logging.level);

  const server = new WelcomeBotServer(config);
  setupSignalHandlers(server);
  await server.start();

  if (config.bot.once) {
    exitAfterFlush(0);
  }
}

if (require.main === module) {
  main(process.argv.slice(2)).catch((error: unknown) => {
    if (error instanceof ConfigurationError) {
      // Configuration problems are not code bugs: no stack trace
      console.error(error.message);
      console.error(`\n${formatUsage()}`);
    } else if (error instanceof AuthenticationError) {
      logger.error(`Authentication failed: ${error.message}`);
    } else {
      logger.error('Failed to start:', error);
    }
    exitAfterFlush(1);
  });
}

export { WelcomeBotServer, main };
