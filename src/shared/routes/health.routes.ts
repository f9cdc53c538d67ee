/**
 * =============================================================================
 * HEALTH CHECK ROUTES - Production Monitoring Endpoints
 * =============================================================================
 *
 * ENDPOINTS:
 * - GET /health          - Quick health check (for load balancers)
 * - GET /health/live     - Liveness probe (is the process running?)
 * - GET /health/ready    - Readiness probe (cache usable, no upstream circuit open)
 * - GET /health/detailed - Process status and circuit breaker states
 *
 * =============================================================================
 */

import { Router, Request, Response } from 'express';
import { z } from 'zod';
import { CircuitBreakerRegistry } from '../resilience/circuit-breaker';
import { CacheService } from '../services/cache.service';
import { logger } from '../services/logger.service';
import { errorMessage } from '../../core/errors/AppError';

export interface HealthRouteDeps {
  cache: CacheService;
  breakers: CircuitBreakerRegistry;
  version: string;
  environment: string;
}

export function createHealthRoutes(deps: HealthRouteDeps): Router {
  const router = Router();
  const startTime = Date.now();

  /**
   * Basic health check - for load balancers
   */
  router.get('/health', (_req: Request, res: Response) => {
    res.status(200).json({
      status: 'healthy',
      timestamp: new Date().toISOString()
    });
  });

  /**
   * Liveness probe - is the process alive?
   */
  router.get('/health/live', (_req: Request, res: Response) => {
    res.status(200).json({
      status: 'alive',
      pid: process.pid,
      uptime: Math.floor((Date.now() - startTime) / 1000)
    });
  });

  /**
   * Readiness probe - can the service accept traffic?
   */
  router.get('/health/ready', async (_req: Request, res: Response) => {
    const checks: Record<string, boolean> = {};

    try {
      await deps.cache.set('health_check', 'ok', 10);
      checks.cache = (await deps.cache.get('health_check', z.string())) === 'ok';
    } catch (error) {
      logger.warn(`Health check: cache round trip failed: ${errorMessage(error)}`);
      checks.cache = false;
    }

    checks.circuits = !deps.breakers.anyOpen();

    const isReady = Object.values(checks).every(v => v);

    res.status(isReady ? 200 : 503).json({
      status: isReady ? 'ready' : 'not_ready',
      checks,
      timestamp: new Date().toISOString()
    });
  });

  /**
   * Detailed health - internal diagnostics
   */
  router.get('/health/detailed', (_req: Request, res: Response) => {
    const memUsage = process.memoryUsage();
    const uptimeSeconds = Math.floor((Date.now() - startTime) / 1000);

    res.json({
      status: 'healthy',
      version: deps.version,
      environment: deps.environment,
      timestamp: new Date().toISOString(),
      server: {
        pid: process.pid,
        uptime: formatUptime(uptimeSeconds),
        uptimeSeconds,
        nodeVersion: process.version
      },
      memory: {
        heapUsed: formatBytes(memUsage.heapUsed),
        rss: formatBytes(memUsage.rss)
      },
      cache: {
        kind: deps.cache.kind,
        ready: deps.cache.isReady()
      },
      circuitBreakers: deps.breakers.getAllStats().reduce<Record<string, unknown>>((acc, cb) => {
        acc[cb.name] = {
          state: cb.state,
          failures: cb.failures,
          successes: cb.successes
        };
        return acc;
      }, {})
    });
  });

  return router;
}

// =============================================================================
// HELPER FUNCTIONS
// =============================================================================

export function formatBytes(bytes: number): string {
  const units = ['B', 'KB', 'MB', 'GB'];
  let value = bytes;
  let unitIndex = 0;

  while (value >= 1024 && unitIndex < units.length - 1) {
    value /= 1024;
    unitIndex++;
  }

  return `${value.toFixed(2)} ${units[unitIndex]}`;
}

export function formatUptime(seconds: number): string {
  const days = Math.floor(seconds / 86400);
  const hours = Math.floor((seconds % 86400) / 3600);
  const minutes = Math.floor((seconds % 3600) / 60);
  const secs = seconds % 60;

  const parts: string[] = [];
  if (days > 0) parts.push(`${days}d`);
  if (hours > 0) parts.push(`${hours}h`);
  if (minutes > 0) parts.push(`${minutes}m`);
  parts.push(`${secs}s`);

  return parts.join(' ');
}
