import express, { type Express } from 'express';
import type { Server } from 'http';
import { createApp } from '../app';
import { asyncHandler, errorHandler, notFoundHandler } from '../error-handler';
import type { HealthCheckable } from '../health';
import { MetricsService } from '@/services/metrics';
import type { PollerStatus } from '@/services/poller';
import { FetchError } from '@/core/errors';

const STATUS: PollerStatus = {
  running: true,
  hashtag: 'introductions',
  intervalSeconds: 5,
  sinceId: '100',
  seenAuthors: 2,
  completedPasses: 3,
  failedPasses: 0
};

interface RunningServer {
  baseUrl: string;
  close: () => Promise<void>;
}

// Listen on an ephemeral port and talk to it with the global fetch
function listen(app: Express): Promise<RunningServer> {
  return new Promise((resolve, reject) => {
    const server: Server = app.listen(0, '127.0.0.1', () => {
      const address = server.address();
      if (address === null || typeof address === 'string') {
        reject(new Error('Server is not listening on a TCP port'));
        return;
      }
      resolve({
        baseUrl: `http://127.0.0.1:${address.port}`,
        close: () => new Promise<void>((done) => {
          server.closeAllConnections();
          server.close(() => done());
        })
      });
    });
    server.on('error', reject);
  });
}

function healthy(result: boolean): HealthCheckable {
  return { healthCheck: async () => result };
}

describe('HTTP status surface', () => {
  let metrics: MetricsService;
  let running: RunningServer | null = null;

  async function start(services: Record<string, HealthCheckable>): Promise<string> {
    running = await listen(createApp({ services, metrics, getStatus: () => STATUS }));
    return running.baseUrl;
  }

  beforeEach(() => {
    metrics = new MetricsService();
  });

  afterEach(async () => {
    if (running) {
      await running.close();
      running = null;
    }
  });

  describe('GET /api/health', () => {
    it('should answer 200 when every service is healthy', async () => {
      const baseUrl = await start({ mastodon: healthy(true), poller: healthy(true) });

      const response = await fetch(`${baseUrl}/api/health`);
      const body = await response.json();

      expect(response.status).toBe(200);
      expect(body).toMatchObject({
        status: 'healthy',
        services: {
          mastodon: { status: 'healthy', healthy: true },
          poller: { status: 'healthy', healthy: true }
        }
      });
    });

    it('should answer 503 when a service is unhealthy', async () => {
      const baseUrl = await start({ mastodon: healthy(true), poller: healthy(false) });

      const response = await fetch(`${baseUrl}/api/health`);
      const body = await response.json();

      expect(response.status).toBe(503);
      expect(body).toMatchObject({
        status: 'unhealthy',
        services: { poller: { status: 'unhealthy', healthy: false } }
      });
    });

    it('should answer 503 with the error when a check throws', async () => {
      const baseUrl = await start({
        mastodon: {
          healthCheck: async () => {
            throw new Error('token expired');
          }
        }
      });

      const response = await fetch(`${baseUrl}/api/health`);
      const body = await response.json();

      expect(response.status).toBe(503);
      expect(body).toMatchObject({
        services: { mastodon: { status: 'error', healthy: false, error: 'token expired' } }
      });
    });
  });

  it('should report the process as alive', async () => {
    const baseUrl = await start({ poller: healthy(false) });

    const response = await fetch(`${baseUrl}/api/health/live`);
    const body = await response.json();

    expect(response.status).toBe(200);
    expect(body).toMatchObject({ status: 'alive', pid: process.pid });
  });

  it('should serve Prometheus metrics', async () => {
    metrics.incrementPasses('completed');
    metrics.incrementWelcomes('sent');
    const baseUrl = await start({});

    const response = await fetch(`${baseUrl}/metrics`);
    const text = await response.text();

    expect(response.status).toBe(200);
    expect(response.headers.get('content-type')).toContain('text/plain');
    expect(text).toContain('welcome_bot_passes_total{status="completed"} 1');
    expect(text).toContain('welcome_bot_welcomes_total{outcome="sent"} 1');
  });

  it('should report the poller status at the root', async () => {
    const baseUrl = await start({});

    const response = await fetch(`${baseUrl}/`);

    expect(await response.json()).toEqual({
      name: 'hashtag-welcome-bot',
      status: 'running',
      poller: STATUS
    });
  });

  it('should answer unknown paths with a JSON 404', async () => {
    const baseUrl = await start({});

    const response = await fetch(`${baseUrl}/nope`);
    const body = await response.json();

    expect(response.status).toBe(404);
    expect(body).toMatchObject({ error: { message: 'Endpoint not found', status: 404, path: '/nope' } });
  });
});

describe('errorHandler', () => {
  let running: RunningServer | null = null;

  afterEach(async () => {
    if (running) {
      await running.close();
      running = null;
    }
  });

  async function startFailing(error: Error): Promise<string> {
    const app = express();
    app.get('/fail', asyncHandler(async () => {
      throw error;
    }));
    app.use(notFoundHandler);
    app.use(errorHandler);
    running = await listen(app);
    return running.baseUrl;
  }

  it('should pass the status and message of a known error through', async () => {
    const baseUrl = await startFailing(new FetchError('Timeline request returned 502: Bad Gateway', { status: 502 }));

    const response = await fetch(`${baseUrl}/fail`);
    const body = await response.json();

    expect(response.status).toBe(502);
    expect(body).toMatchObject({
      error: {
        message: 'Timeline request returned 502: Bad Gateway',
        status: 502,
        path: '/fail'
      }
    });
  });

  it('should hide the message of an unexpected error', async () => {
    const baseUrl = await startFailing(new Error('database password is wrong'));

    const response = await fetch(`${baseUrl}/fail`);
    const body = await response.json();

    expect(response.status).toBe(500);
    expect(body).toMatchObject({ error: { message: 'Internal Server Error', status: 500 } });
  });
});
