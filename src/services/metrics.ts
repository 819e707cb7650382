import client from 'prom-client';
import logger from '@/utils/logger';
import { secondsSince } from '@/utils/time';

export type PassStatus = 'completed' | 'failed';
export type WelcomeOutcome = 'sent' | 'dry_run' | 'failed';

export class MetricsService {
  private readonly registry: client.Registry;

  private readonly passesTotal: client.Counter<string>;
  private readonly postsFetchedTotal: client.Counter<string>;
  private readonly welcomesTotal: client.Counter<string>;
  private readonly seenAuthors: client.Gauge<string>;
  private readonly passDuration: client.Histogram<string>;

  constructor() {
    this.registry = new client.Registry();

    this.passesTotal = new client.Counter({
      name: 'welcome_bot_passes_total',
      help: 'Fetch-decide-post passes run',
      labelNames: ['status'],
      registers: [this.registry]
    });

    this.postsFetchedTotal = new client.Counter({
      name: 'welcome_bot_posts_fetched_total',
      help: 'Hashtag timeline posts fetched',
      registers: [this.registry]
    });

    this.welcomesTotal = new client.Counter({
      name: 'welcome_bot_welcomes_total',
      help: 'Welcome replies by outcome',
      labelNames: ['outcome'],
      registers: [this.registry]
    });

    this.seenAuthors = new client.Gauge({
      name: 'welcome_bot_seen_authors',
      help: 'Distinct authors welcomed since the process started',
      registers: [this.registry]
    });

    this.passDuration = new client.Histogram({
      name: 'welcome_bot_pass_duration_seconds',
      help: 'Duration of one pass in seconds',
      buckets: [0.1, 0.5, 1, 2, 5, 10, 30],
      registers: [this.registry]
    });

    client.collectDefaultMetrics({ register: this.registry });

    logger.debug('Metrics service initialized');
  }

  incrementPasses(status: PassStatus): void {
    this.passesTotal.inc({ status });
  }

  incrementPostsFetched(count: number): void {
    this.postsFetchedTotal.inc(count);
  }

  incrementWelcomes(outcome: WelcomeOutcome): void {
    this.welcomesTotal.inc({ outcome });
  }

  setSeenAuthors(count: number): void {
    this.seenAuthors.set(count);
  }

  startPassTimer(): () => void {
    const startTime = Date.now();
    return () => {
      this.passDuration.observe(secondsSince(startTime));
    };
  }

  async getMetrics(): Promise<string> {
    return this.registry.metrics();
  }

  getContentType(): string {
    return this.registry.contentType;
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.getMetrics();
      return true;
    } catch (error) {
      logger.error('Metrics health check failed:', error);
      return false;
    }
  }
}
