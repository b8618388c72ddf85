/**
 * HTTP application
 *
 * Wires the services into the operator-facing Hono app. Construction of the
 * services themselves happens in index.ts (or in tests).
 */

import { Hono } from 'hono';
import { cors } from 'hono/cors';
import type { QuestionCache } from './cache/QuestionCache.js';
import type { Logger } from './logger.js';
import type { ModelSelection } from './models/providers.js';
import { requestLogger } from './middleware/requestLogger.js';
import type { PreGenerationAgent } from './pregeneration/PreGenerationAgent.js';
import type { QuestionService } from './questions/QuestionService.js';
import {
  createCacheRoutes,
  createHealthRoutes,
  createModelRoutes,
  createQuestionRoutes,
  createTaskRoutes,
} from './routes/index.js';
import type { TaskRunner } from './tasks/TaskRunner.js';
import { ErrorType, errorResponse, handleApiError } from './utils/errors.js';

export interface AppDeps {
  cache: QuestionCache;
  questions: QuestionService;
  agent: PreGenerationAgent;
  tasks: TaskRunner;
  logger: Logger;
  /** Environment consulted for provider API keys (default: process.env) */
  env?: Record<string, string | undefined>;
  /** Default model reported by GET /models */
  defaultModel?: ModelSelection;
}

export function createApp(deps: AppDeps) {
  const { cache, questions, agent, tasks, logger } = deps;
  const app = new Hono();

  app.use('/*', cors({
    origin: '*',
    allowMethods: ['GET', 'POST', 'DELETE', 'OPTIONS'],
    allowHeaders: ['Content-Type'],
  }));
  app.use('*', requestLogger(logger));

  app.route('/questions', createQuestionRoutes(questions, logger));
  app.route('/cache', createCacheRoutes({ cache, agent, tasks }));
  app.route('/tasks', createTaskRoutes(tasks));
  app.route('/models', createModelRoutes({ env: deps.env, defaultModel: deps.defaultModel }));
  app.route('/health', createHealthRoutes(cache, tasks));

  app.notFound((c) => errorResponse(c, 'Not found', ErrorType.NOT_FOUND, `${c.req.method} ${c.req.path}`));

  // Global error handler - catches all unhandled errors across all routes
  app.onError((error, c) => {
    logger.error('http.unhandled_error', {
      error: error.message,
      stack: error.stack,
      path: c.req.path,
      method: c.req.method,
    });
    return handleApiError(c, error, 'An unexpected error occurred');
  });

  return app;
}
