/**
 * Pre-Generation Agent
 *
 * Predicts which question sets will be requested next and fills the cache
 * with them in the background, in batches that cap concurrent load on the
 * generator. Every failure is contained to the configuration that caused it.
 */

import type { QuestionCache } from '../cache/QuestionCache.js';
import { isStatsSnapshot } from '../cache/types.js';
import { deriveCacheKey } from '../cache/CacheKey.js';
import type { QuestionGenerator } from '../generation/types.js';
import type { Logger } from '../logger.js';
import type { PriorityConfiguration, QuestionRequest } from '../types.js';
import { ABORTED, sleep, untilAborted } from '../utils/abort.js';
import { errorMessage } from '../utils/errors.js';
import { DemandTracker } from './DemandTracker.js';
import { DEFAULT_PRIORITY_CONFIGS, WEEKEND_PRACTICE_CONFIGS } from './priorities.js';
import { dedupeByCacheKey, predictNextRequests, weekdayOf } from './predictor.js';
import type {
  FillOutcome,
  MonitorOutcome,
  PregenerationConfig,
  PregenerationReport,
  ScheduleOptions,
} from './types.js';

export interface PreGenerationAgentDeps {
  cache: QuestionCache;
  generator: QuestionGenerator;
  logger: Logger;
  config: PregenerationConfig;
  demand?: DemandTracker;
  priorities?: readonly PriorityConfiguration[];
  weekendPractice?: readonly PriorityConfiguration[];
  /** Wall clock used by the periodic loop */
  clock?: () => Date;
}

export class PreGenerationAgent {
  private readonly cache: QuestionCache;
  private readonly generator: QuestionGenerator;
  private readonly logger: Logger;
  private readonly config: PregenerationConfig;
  private readonly demand: DemandTracker;
  private readonly clock: () => Date;

  readonly priorities: readonly PriorityConfiguration[];
  readonly weekendPractice: readonly PriorityConfiguration[];

  constructor(deps: PreGenerationAgentDeps) {
    this.cache = deps.cache;
    this.generator = deps.generator;
    this.logger = deps.logger.child({ component: 'pregeneration' });
    this.config = deps.config;
    this.demand = deps.demand ?? new DemandTracker();
    this.priorities = deps.priorities ?? DEFAULT_PRIORITY_CONFIGS;
    this.weekendPractice = deps.weekendPractice ?? WEEKEND_PRACTICE_CONFIGS;
    this.clock = deps.clock ?? (() => new Date());
  }

  /**
   * Predict likely requests for a point in the week
   *
   * @param hour - Hour of day (0-23)
   * @param weekday - Day of week (0 = Monday … 6 = Sunday)
   */
  predictNextRequests(hour: number, weekday: number): PriorityConfiguration[] {
    return predictNextRequests(hour, weekday, {
      priorities: this.priorities,
      weekendPractice: this.weekendPractice,
      peakWindows: this.config.peakWindows,
    });
  }

  /**
   * Configurations worth filling when the hit rate is low: the most-missed
   * hot-path requests first, then the static priority list
   */
  analyzeUserPatterns(limit: number = this.config.adaptiveLimit): QuestionRequest[] {
    return dedupeByCacheKey([...this.demand.topMissed(limit), ...this.priorities]);
  }

  /**
   * Fill the cache for a list of configurations, `batchSize` at a time
   *
   * Each batch runs concurrently and must fully settle before the agent
   * pauses and moves on to the next one. Duplicate configurations are dropped.
   */
  async schedulePregeneration(
    configs: readonly QuestionRequest[],
    options: ScheduleOptions = {}
  ): Promise<PregenerationReport> {
    const batchSize = Math.max(1, Math.floor(options.batchSize ?? this.config.batchSize));
    const batchDelayMs = options.batchDelayMs ?? this.config.batchDelayMs;
    const { signal } = options;
    const unique = dedupeByCacheKey(configs);

    const report: PregenerationReport = {
      requested: unique.length,
      generated: 0,
      skipped: 0,
      failed: 0,
      batches: 0,
      cancelled: false,
    };

    if (!this.cache.isEnabled()) {
      this.logger.info('pregen.skipped', { reason: 'cache disabled', configurations: unique.length });
      return report;
    }

    this.logger.info('pregen.started', { configurations: unique.length, batchSize });

    for (let start = 0; start < unique.length; start += batchSize) {
      if (signal?.aborted) {
        report.cancelled = true;
        break;
      }

      const batch = unique.slice(start, start + batchSize);
      const batchNumber = start / batchSize + 1;

      const outcomes = await untilAborted(
        Promise.all(batch.map((config) => this.fillOne(config, signal))),
        signal
      );
      if (outcomes === ABORTED) {
        report.cancelled = true;
        this.logger.warn('pregen.batch.cancelled', { batch: batchNumber });
        break;
      }

      for (const outcome of outcomes) {
        report[outcome]++;
      }
      report.batches++;
      this.logger.info('pregen.batch.completed', {
        batch: batchNumber,
        generated: outcomes.filter((o) => o === 'generated').length,
        skipped: outcomes.filter((o) => o === 'skipped').length,
        failed: outcomes.filter((o) => o === 'failed').length,
      });

      const hasNextBatch = start + batchSize < unique.length;
      if (hasNextBatch && !(await sleep(batchDelayMs, signal))) {
        report.cancelled = true;
        break;
      }
    }

    this.logger.info('pregen.completed', { ...report });
    return report;
  }

  /**
   * Generate and cache one configuration unless it is already cached
   *
   * Never throws; failures are logged and reported as 'failed'.
   */
  async fillOne(config: QuestionRequest, signal?: AbortSignal): Promise<FillOutcome> {
    const cacheKey = deriveCacheKey(config);
    const log = this.logger.child({
      cacheKey,
      subject: config.subject,
      difficulty: config.difficulty,
      count: config.count,
      examType: config.examType ?? null,
    });

    try {
      if (await this.cache.get(cacheKey)) {
        log.info('pregen.fill.skipped', { reason: 'already cached' });
        return 'skipped';
      }

      log.info('pregen.fill.started');
      const questions = await this.generator.generate(config, { signal });

      if (questions.length === 0) {
        log.warn('pregen.fill.failed', { error: 'Generator returned no questions' });
        return 'failed';
      }

      if (!(await this.cache.set(cacheKey, questions))) {
        log.warn('pregen.fill.failed', { error: 'Cache store rejected the set' });
        return 'failed';
      }

      log.info('pregen.fill.completed', { questionCount: questions.length });
      return 'generated';
    } catch (error) {
      log.error('pregen.fill.failed', { error: errorMessage(error) });
      return 'failed';
    }
  }

  /**
   * Fill the head of the priority list, intended for application boot
   */
  async warmCacheOnStartup(signal?: AbortSignal): Promise<PregenerationReport> {
    this.logger.info('pregen.warmup.started', { configurations: this.config.warmupCount });
    const report = await this.schedulePregeneration(this.priorities.slice(0, this.config.warmupCount), {
      batchSize: this.config.warmupBatchSize,
      signal,
    });
    this.logger.info('pregen.warmup.completed', { ...report });
    return report;
  }

  /**
   * Check the hit rate and escalate pre-generation when it is low
   */
  async monitorAndAdapt(signal?: AbortSignal): Promise<MonitorOutcome> {
    const stats = await this.cache.stats();
    if (!isStatsSnapshot(stats)) {
      this.logger.debug('pregen.monitor.skipped', { reason: 'stats unavailable' });
      return { action: 'disabled' };
    }

    const hitRate = stats.hit_rate_percentage;
    this.logger.info('pregen.monitor', {
      hitRate,
      hits: stats.total_hits,
      misses: stats.total_misses,
      cachedSets: stats.total_cached_sets,
    });

    if (hitRate < this.config.escalateBelowHitRate) {
      const patterns = this.analyzeUserPatterns();
      this.logger.warn('pregen.monitor.escalating', {
        hitRate,
        threshold: this.config.escalateBelowHitRate,
        configurations: patterns.length,
      });
      const report = await this.schedulePregeneration(patterns, {
        batchSize: this.config.escalatedBatchSize,
        batchDelayMs: this.config.escalatedBatchDelayMs,
        signal,
      });
      return { action: 'escalated', hitRate, report };
    }

    if (hitRate > this.config.maintainAboveHitRate) {
      this.logger.info('pregen.monitor.maintaining', { hitRate });
      return { action: 'maintained', hitRate };
    }

    return { action: 'steady', hitRate };
  }

  /**
   * One round of the periodic loop: predict, fill, then monitor
   */
  async runIteration(signal?: AbortSignal): Promise<void> {
    const now = this.clock();
    const predictions = this.predictNextRequests(now.getHours(), weekdayOf(now));
    await this.schedulePregeneration(predictions, { signal });
    if (!signal?.aborted) {
      await this.monitorAndAdapt(signal);
    }
  }

  /**
   * Run pre-generation every `intervalMinutes` until `signal` aborts
   *
   * Errors in one iteration are logged and the loop carries on.
   *
   * @returns Number of iterations that ran
   */
  async runPeriodicPregeneration(intervalMinutes: number, signal?: AbortSignal): Promise<number> {
    const intervalMs = intervalMinutes * 60_000;
    let iterations = 0;

    this.logger.info('pregen.loop.started', { intervalMinutes });

    while (!signal?.aborted) {
      try {
        await this.runIteration(signal);
      } catch (error) {
        this.logger.error('pregen.loop.iteration_failed', { error: errorMessage(error) });
      }
      iterations++;

      if (!(await sleep(intervalMs, signal))) {
        break;
      }
    }

    this.logger.info('pregen.loop.stopped', { iterations });
    return iterations;
  }
}
