import { Router } from 'express';
import { asyncHandler } from '@/api/error-handler';
import logger from '@/utils/logger';
import { getCurrentTimestamp } from '@/utils/time';
import { toErrorMessage } from '@/utils/text';

export interface HealthCheckable {
  healthCheck: () => Promise<boolean>;
}

interface ServiceCheck {
  status: 'healthy' | 'unhealthy' | 'error';
  healthy: boolean;
  error?: string;
}

export function createHealthRouter(services: Record<string, HealthCheckable>): Router {
  const router = Router();

  router.get('/health', asyncHandler(async (req, res) => {
    const startTime = Date.now();

    const entries = await Promise.all(
      Object.entries(services).map(async ([name, service]) => [name, await checkService(service)] as const)
    );
    const checks: Record<string, ServiceCheck> = Object.fromEntries(entries);
    const unhealthy = entries.filter(([, check]) => !check.healthy).map(([name]) => name);
    const allHealthy = unhealthy.length === 0;

    res.status(allHealthy ? 200 : 503).json({
      status: allHealthy ? 'healthy' : 'unhealthy',
      timestamp: getCurrentTimestamp(),
      version: process.env.npm_package_version || '1.0.0',
      uptime: process.uptime(),
      responseTime: Date.now() - startTime,
      services: checks
    });

    if (!allHealthy) {
      logger.warn('Health check failed', { unhealthyServices: unhealthy });
    }
  }));

  router.get('/health/live', asyncHandler(async (req, res) => {
    res.status(200).json({
      status: 'alive',
      timestamp: getCurrentTimestamp(),
      pid: process.pid,
      uptime: process.uptime()
    });
  }));

  return router;
}

async function checkService(service: HealthCheckable): Promise<ServiceCheck> {
  try {
    const healthy = await service.healthCheck();
    return { status: healthy ? 'healthy' : 'unhealthy', healthy };
  } catch (error) {
    return { status: 'error', healthy: false, error: toErrorMessage(error) };
  }
}
