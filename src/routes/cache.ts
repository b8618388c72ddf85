import { Hono } from 'hono';
import type { QuestionCache } from '../cache/QuestionCache.js';
import { DEFAULT_CACHE_PATTERN } from '../cache/CacheKey.js';
import { validateBody, validateQuery } from '../middleware/validation.js';
import type { PreGenerationAgent } from '../pregeneration/PreGenerationAgent.js';
import type { TaskRunner } from '../tasks/TaskRunner.js';
import { ErrorType, errorResponse } from '../utils/errors.js';
import { invalidateQuerySchema, toQuestionRequest, warmRequestSchema } from './schemas.js';

export interface CacheRouteDeps {
  cache: QuestionCache;
  agent: PreGenerationAgent;
  tasks: TaskRunner;
}

export function createCacheRoutes({ cache, agent, tasks }: CacheRouteDeps) {
  const routes = new Hono();

  /**
   * GET /cache/stats
   */
  routes.get('/stats', async (c) => {
    return c.json(await cache.stats());
  });

  /**
   * DELETE /cache?pattern=questions:*
   * Invalidate entries matching a glob pattern (all entries by default)
   */
  routes.delete('/', validateQuery(invalidateQuerySchema), async (c) => {
    const pattern = c.get('validatedQuery').pattern ?? DEFAULT_CACHE_PATTERN;
    const deleted = await cache.invalidate(pattern);
    return c.json({ pattern, deleted });
  });

  /**
   * POST /cache/warm
   * Start pre-generation in the background; the priority list when no
   * configurations are given
   */
  routes.post('/warm', validateBody(warmRequestSchema), async (c) => {
    if (!cache.isEnabled()) {
      return errorResponse(c, 'Question cache is disabled', ErrorType.SERVICE_UNAVAILABLE);
    }

    const body = c.get('validatedBody');
    const configurations = body.configurations?.map(toQuestionRequest) ?? [...agent.priorities];

    const task = tasks.submit('cache-warm', (signal) =>
      agent.schedulePregeneration(configurations, { batchSize: body.batch_size, signal })
    );

    return c.json({ task_id: task.id, configurations: configurations.length }, 202);
  });

  return routes;
}
