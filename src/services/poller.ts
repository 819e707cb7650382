import type { WelcomeRunner } from './runner';
import type { WelcomeContext } from '@/core/context';
import logger from '@/utils/logger';
import { toErrorMessage } from '@/utils/text';

export type PassRunner = Pick<WelcomeRunner, 'initializeCursor' | 'runOnce'>;

export interface PollerStatus {
  running: boolean;
  hashtag: string;
  intervalSeconds: number;
  sinceId?: string;
  seenAuthors: number;
  completedPasses: number;
  failedPasses: number;
}

/**
 * Runs a pass, waits `intervalSeconds`, runs the next. Passes never overlap
 * and `stop()` takes effect between passes only, so the seen set always
 * matches the replies that were actually attempted. The cursor is
 * initialized inside the first pass, so a failed lookup is retried like any
 * other failed fetch.
 */
export class HashtagPoller {
  private isRunning = false;
  private shouldStop = false;
  private pollTimer: NodeJS.Timeout | null = null;
  private currentPass: Promise<void> | null = null;
  private cursorInitialized = false;
  private completedPasses = 0;
  private failedPasses = 0;

  constructor(
    private runner: PassRunner,
    private context: WelcomeContext,
    private intervalSeconds: number
  ) {}

  async start(): Promise<void> {
    if (this.isRunning) {
      logger.warn('Hashtag poller is already running');
      return;
    }

    this.isRunning = true;
    this.shouldStop = false;

    logger.info('Starting hashtag poller', {
      hashtag: this.context.hashtag,
      intervalSeconds: this.intervalSeconds,
      sinceId: this.context.sinceId
    });

    this.currentPass = this.pollLoop();
  }

  async stop(): Promise<void> {
    logger.info('Stopping hashtag poller');

    this.shouldStop = true;

    if (this.pollTimer) {
      clearTimeout(this.pollTimer);
      this.pollTimer = null;
    }

    // Let a pass in flight finish its batch
    if (this.currentPass) {
      await this.currentPass;
    }

    this.isRunning = false;
    logger.info('Hashtag poller stopped');
  }

  // Never rejects: a failed pass is logged and the next one is scheduled
  private async pollLoop(): Promise<void> {
    try {
      if (!this.cursorInitialized) {
        await this.runner.initializeCursor(this.context);
        this.cursorInitialized = true;
      }
      await this.runner.runOnce(this.context);
      this.completedPasses++;
    } catch (error) {
      this.failedPasses++;
      logger.error(`Welcome pass failed, next pass in ${this.intervalSeconds}s: ${toErrorMessage(error)}`);
    }

    if (this.shouldStop) {
      this.currentPass = null;
      return;
    }

    logger.debug(`Sleeping for ${this.intervalSeconds} seconds`);
    this.pollTimer = setTimeout(() => {
      this.pollTimer = null;
      this.currentPass = this.pollLoop();
    }, this.intervalSeconds * 1000);
  }

  async healthCheck(): Promise<boolean> {
    return this.isRunning && !this.shouldStop;
  }

  getStatus(): PollerStatus {
    return {
      running: this.isRunning,
      hashtag: this.context.hashtag,
      intervalSeconds: this.intervalSeconds,
      sinceId: this.context.sinceId,
      seenAuthors: this.context.seen.size,
      completedPasses: this.completedPasses,
      failedPasses: this.failedPasses
    };
  }
}
