/**
 * Service entry point
 *
 * Loads configuration, connects the cache (degrading to real-time generation
 * when the store is unreachable), starts the background tasks and serves the
 * HTTP app until SIGINT/SIGTERM.
 */

import { serve } from '@hono/node-server';
import { createApp } from './app.js';
import { QuestionCache } from './cache/index.js';
import { getConfig } from './config.js';
import { HttpQuestionGenerator } from './generation/index.js';
import { createLogger } from './logger.js';
import { DemandTracker, FillQueue, PreGenerationAgent } from './pregeneration/index.js';
import { QuestionService } from './questions/QuestionService.js';
import { createBackend } from './storage/index.js';
import { TaskRunner } from './tasks/TaskRunner.js';
import { errorMessage } from './utils/errors.js';

async function main(): Promise<void> {
  const config = getConfig();
  const logger = createLogger({ level: config.logLevel, bindings: { service: 'question-cache' } });

  const backend = createBackend(config.cache, logger);
  const cache = await QuestionCache.connect(backend, { defaultTtlSeconds: config.cache.ttlSeconds }, logger);
  const generator = new HttpQuestionGenerator(config.generator);
  const demand = new DemandTracker();
  const tasks = new TaskRunner(logger.child({ component: 'tasks' }));

  const agent = new PreGenerationAgent({
    cache,
    generator,
    logger,
    config: config.pregeneration,
    demand,
  });

  const questions = new QuestionService({
    cache,
    generator,
    logger,
    demand,
    relatedFills: config.pregeneration.relatedFill ? new FillQueue(agent, tasks, logger) : undefined,
  });

  if (config.pregeneration.enabled && cache.isEnabled()) {
    if (config.pregeneration.warmOnStartup) {
      tasks.submit('startup-warmup', (signal) => agent.warmCacheOnStartup(signal));
    }
    tasks.submit('periodic-pregeneration', (signal) =>
      agent.runPeriodicPregeneration(config.pregeneration.intervalMinutes, signal)
    );
  }

  const app = createApp({ cache, questions, agent, tasks, logger, defaultModel: config.generator.defaultModel });
  const server = serve({ fetch: app.fetch, port: config.port }, (info) => {
    logger.info('server.started', { port: info.port, cacheEnabled: cache.isEnabled() });
  });

  let stopping = false;
  const shutdown = async (signal: string) => {
    if (stopping) return;
    stopping = true;
    logger.info('server.stopping', { signal });

    server.close();
    await tasks.shutdown();
    await cache.close();

    logger.info('server.stopped');
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      shutdown(signal).catch((error: unknown) => {
        logger.error('server.shutdown_failed', { error: errorMessage(error) });
        process.exitCode = 1;
      });
    });
  }
}

main().catch((error: unknown) => {
  console.error('Failed to start:', errorMessage(error));
  process.exit(1);
});
