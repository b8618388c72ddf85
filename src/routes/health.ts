import { Hono } from 'hono';
import type { QuestionCache } from '../cache/QuestionCache.js';
import type { TaskRunner } from '../tasks/TaskRunner.js';

export interface HealthResponse {
  status: 'ok' | 'degraded';
  cache: {
    enabled: boolean;
    backend: ReturnType<QuestionCache['describeBackend']>;
  };
  tasks: { running: number };
  timestamp: string;
}

/**
 * GET /health
 * A disabled cache is reported as degraded but still answers 200: requests
 * are served by real-time generation.
 */
export function createHealthRoutes(cache: QuestionCache, tasks: TaskRunner) {
  const health = new Hono();

  health.get('/', (c) => {
    const enabled = cache.isEnabled();
    const response: HealthResponse = {
      status: enabled ? 'ok' : 'degraded',
      cache: { enabled, backend: cache.describeBackend() },
      tasks: { running: tasks.runningCount() },
      timestamp: new Date().toISOString(),
    };
    return c.json(response);
  });

  return health;
}
