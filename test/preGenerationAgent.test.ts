import { describe, it, expect, beforeEach } from 'vitest';
import { PreGenerationAgent } from '../src/pregeneration/PreGenerationAgent.js';
import { DemandTracker } from '../src/pregeneration/DemandTracker.js';
import { QuestionCache } from '../src/cache/QuestionCache.js';
import { deriveCacheKey } from '../src/cache/CacheKey.js';
import { MemoryBackend } from '../src/storage/memory.js';
import { createSilentLogger, type Logger } from '../src/logger.js';
import type { PregenerationConfig } from '../src/pregeneration/types.js';
import type { PriorityConfiguration } from '../src/types.js';
import { StubGenerator, UnreachableBackend, captureLogger, makeQuestions, pregenerationConfig } from './helpers.js';

const physics = { subject: 'Physics', difficulty: 'Medium', count: 30, examType: 'IIT_JEE' };
const chemistry = { subject: 'Chemistry', difficulty: 'Medium', count: 30, examType: 'IIT_JEE' };
const biology = { subject: 'Biology', difficulty: 'Medium', count: 45, examType: 'NEET' };

const smallPriorities: PriorityConfiguration[] = [
  { subject: 'Mathematics', difficulty: 'Medium', count: 30, examType: 'IIT_JEE' },
  { subject: 'Physics', difficulty: 'Hard', count: 30, examType: 'IIT_JEE' },
];

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe('PreGenerationAgent', () => {
  let cache: QuestionCache;
  let generator: StubGenerator;
  let demand: DemandTracker;

  function createAgent(
    overrides: Partial<PregenerationConfig> = {},
    extra: { priorities?: PriorityConfiguration[]; clock?: () => Date; logger?: Logger } = {}
  ): PreGenerationAgent {
    return new PreGenerationAgent({
      cache,
      generator,
      demand,
      logger: extra.logger ?? createSilentLogger(),
      config: pregenerationConfig(overrides),
      priorities: extra.priorities,
      clock: extra.clock,
    });
  }

  beforeEach(async () => {
    cache = await QuestionCache.connect(new MemoryBackend(), { defaultTtlSeconds: 1800 }, createSilentLogger());
    generator = new StubGenerator();
    demand = new DemandTracker();
  });

  describe('schedulePregeneration', () => {
    it('should generate missing sets once and skip them afterwards', async () => {
      const agent = createAgent();

      const first = await agent.schedulePregeneration([physics, chemistry]);
      expect(first).toEqual({ requested: 2, generated: 2, skipped: 0, failed: 0, batches: 1, cancelled: false });

      const second = await agent.schedulePregeneration([physics, chemistry]);
      expect(second).toEqual({ requested: 2, generated: 0, skipped: 2, failed: 0, batches: 1, cancelled: false });

      expect(generator.calls).toHaveLength(2);
      expect(await cache.get(deriveCacheKey(physics))).toEqual(makeQuestions(30, 'Physics'));
    });

    it('should drop configurations that share a cache key', async () => {
      const agent = createAgent();

      const report = await agent.schedulePregeneration([physics, { ...physics, subject: 'physics' }]);

      expect(report.requested).toBe(1);
      expect(generator.calls).toHaveLength(1);
    });

    it('should contain a failure to its own configuration', async () => {
      generator.setHandler(async (request) => {
        if (request.subject === 'Chemistry') {
          throw new Error('generator timeout');
        }
        return makeQuestions(2, request.subject);
      });
      const agent = createAgent();

      const report = await agent.schedulePregeneration([physics, chemistry, biology]);

      expect(report).toMatchObject({ generated: 2, failed: 1 });
      expect(await cache.get(deriveCacheKey(physics))).not.toBeNull();
      expect(await cache.get(deriveCacheKey(biology))).not.toBeNull();
      expect(await cache.get(deriveCacheKey(chemistry))).toBeNull();
    });

    it('should count an empty generation as a failure', async () => {
      generator.setHandler(async () => []);
      const agent = createAgent();

      const report = await agent.schedulePregeneration([physics]);

      expect(report).toMatchObject({ generated: 0, failed: 1 });
      expect(await cache.get(deriveCacheKey(physics))).toBeNull();
    });

    it('should run at most batchSize generations at once', async () => {
      let inFlight = 0;
      let maxInFlight = 0;
      generator.setHandler(async (request) => {
        inFlight++;
        maxInFlight = Math.max(maxInFlight, inFlight);
        await delay(5);
        inFlight--;
        return makeQuestions(1, request.subject);
      });
      const agent = createAgent({ batchSize: 2 });
      const configs = ['A', 'B', 'C', 'D', 'E'].map((subject) => ({ ...physics, subject }));

      const report = await agent.schedulePregeneration(configs);

      expect(report.batches).toBe(3);
      expect(report.generated).toBe(5);
      expect(maxInFlight).toBe(2);
    });

    it('should do nothing when the cache is disabled', async () => {
      cache = await QuestionCache.connect(new UnreachableBackend(), { defaultTtlSeconds: 1800 }, createSilentLogger());
      const agent = createAgent();

      const report = await agent.schedulePregeneration([physics, chemistry]);

      expect(report).toEqual({ requested: 2, generated: 0, skipped: 0, failed: 0, batches: 0, cancelled: false });
      expect(generator.calls).toHaveLength(0);
    });

    it('should log each fill with its cache key', async () => {
      const { logger, entries } = captureLogger();
      const agent = createAgent({}, { logger });

      await agent.schedulePregeneration([physics]);

      const completed = entries.find((entry) => entry.event === 'pregen.fill.completed');
      expect(completed).toMatchObject({
        cacheKey: deriveCacheKey(physics),
        subject: 'Physics',
        difficulty: 'Medium',
        count: 30,
        examType: 'IIT_JEE',
        questionCount: 30,
        component: 'pregeneration',
      });
    });
  });

  describe('cancellation', () => {
    it('should not start when the signal is already aborted', async () => {
      const agent = createAgent();
      const controller = new AbortController();
      controller.abort();

      const report = await agent.schedulePregeneration([physics], { signal: controller.signal });

      expect(report).toMatchObject({ batches: 0, cancelled: true });
      expect(generator.calls).toHaveLength(0);
    });

    it('should stop waiting on a batch once aborted', async () => {
      const controller = new AbortController();
      generator.setHandler(async (request) => {
        controller.abort();
        return makeQuestions(1, request.subject);
      });
      const agent = createAgent({ batchSize: 1 });

      const report = await agent.schedulePregeneration([physics, chemistry, biology], { signal: controller.signal });

      expect(report).toMatchObject({ batches: 0, cancelled: true });
      expect(generator.calls).toHaveLength(1);
    });

    it('should end the pause between batches early', async () => {
      const controller = new AbortController();
      const agent = createAgent({ batchSize: 1, batchDelayMs: 60_000 });

      const running = agent.schedulePregeneration([physics, chemistry], { signal: controller.signal });
      setTimeout(() => controller.abort(), 20);
      const report = await running;

      expect(report).toMatchObject({ generated: 1, batches: 1, cancelled: true });
      expect(generator.calls).toHaveLength(1);
    });
  });

  describe('warmCacheOnStartup', () => {
    it('should fill the head of the priority list in small batches', async () => {
      const agent = createAgent({ warmupCount: 5, warmupBatchSize: 2 });

      const report = await agent.warmCacheOnStartup();

      expect(report).toMatchObject({ requested: 5, generated: 5, batches: 3 });
      expect(generator.calls.map((call) => call.subject)).toEqual([
        'Mathematics',
        'Physics',
        'Chemistry',
        'Mathematics',
        'Physics',
      ]);
    });
  });

  describe('monitorAndAdapt', () => {
    it('should do nothing when the cache is disabled', async () => {
      cache = await QuestionCache.connect(new UnreachableBackend(), { defaultTtlSeconds: 1800 }, createSilentLogger());
      const agent = createAgent();

      expect(await agent.monitorAndAdapt()).toEqual({ action: 'disabled' });
    });

    it('should escalate below the threshold, most-missed requests first', async () => {
      demand.recordMiss(biology);
      await cache.get(deriveCacheKey(biology));
      const agent = createAgent({}, { priorities: smallPriorities });

      expect(agent.analyzeUserPatterns()).toEqual([biology, ...smallPriorities]);

      const outcome = await agent.monitorAndAdapt();

      expect(outcome).toEqual({
        action: 'escalated',
        hitRate: 0,
        report: { requested: 3, generated: 3, skipped: 0, failed: 0, batches: 1, cancelled: false },
      });
      expect(await cache.get(deriveCacheKey(biology))).not.toBeNull();
    });

    it('should maintain above the upper threshold', async () => {
      const key = deriveCacheKey(physics);
      await cache.set(key, makeQuestions(1));
      for (let i = 0; i < 10; i++) {
        await cache.get(key);
      }
      const agent = createAgent();

      expect(await agent.monitorAndAdapt()).toEqual({ action: 'maintained', hitRate: 100 });
      expect(generator.calls).toHaveLength(0);
    });

    it('should hold steady between the thresholds', async () => {
      const key = deriveCacheKey(physics);
      await cache.set(key, makeQuestions(1));
      for (let i = 0; i < 8; i++) {
        await cache.get(key);
      }
      await cache.get(deriveCacheKey(chemistry));
      await cache.get(deriveCacheKey(biology));
      const agent = createAgent();

      expect(await agent.monitorAndAdapt()).toEqual({ action: 'steady', hitRate: 80 });
    });
  });

  describe('runPeriodicPregeneration', () => {
    it('should fill predictions each round until aborted', async () => {
      const controller = new AbortController();
      const mondayMorning = new Date(2024, 0, 1, 8, 0, 0);
      const agent = createAgent({}, { priorities: smallPriorities, clock: () => mondayMorning });

      const loop = agent.runPeriodicPregeneration(30, controller.signal);
      await new Promise<void>((resolve) => {
        const check = () => (generator.calls.length >= 2 ? resolve() : setTimeout(check, 5));
        check();
      });
      controller.abort();

      expect(await loop).toBe(1);
      expect(generator.calls.map((call) => call.subject)).toEqual(['Mathematics', 'Physics']);
    });

    it('should keep running after a failed round', async () => {
      const controller = new AbortController();
      const { logger, entries } = captureLogger();
      const agent = createAgent(
        {},
        {
          logger,
          clock: () => {
            throw new Error('clock unavailable');
          },
        }
      );

      // 30ms between rounds
      const loop = agent.runPeriodicPregeneration(0.0005, controller.signal);
      await new Promise<void>((resolve) => {
        const check = () =>
          entries.filter((entry) => entry.event === 'pregen.loop.iteration_failed').length >= 2
            ? resolve()
            : setTimeout(check, 5);
        check();
      });
      controller.abort();

      expect(await loop).toBeGreaterThanOrEqual(2);
      expect(entries.find((entry) => entry.event === 'pregen.loop.iteration_failed')?.error).toBe('clock unavailable');
    });
  });
});
