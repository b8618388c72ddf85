/**
 * Question Service
 *
 * The request path: serve a question set from the cache, or generate it,
 * store it and return it.
 */

import type { QuestionCache } from '../cache/QuestionCache.js';
import { deriveCacheKey } from '../cache/CacheKey.js';
import type { QuestionGenerator } from '../generation/types.js';
import type { Logger } from '../logger.js';
import { parseModelSelection } from '../models/providers.js';
import type { DemandTracker } from '../pregeneration/DemandTracker.js';
import type { FillQueue } from '../pregeneration/FillQueue.js';
import { relatedDifficulties } from '../pregeneration/predictor.js';
import { describeRequest, type Question, type QuestionRequest } from '../types.js';
import { QuestionGenerationError, errorMessage } from '../utils/errors.js';

export interface QuestionLookup {
  source: 'cache' | 'generated';
  cacheKey: string;
  questions: Question[];
}

export interface QuestionServiceDeps {
  cache: QuestionCache;
  generator: QuestionGenerator;
  logger: Logger;
  demand?: DemandTracker;
  /** Receives the other difficulty tiers of each generated request; omit to skip them */
  relatedFills?: FillQueue;
}

export class QuestionService {
  private readonly logger: Logger;

  constructor(private readonly deps: QuestionServiceDeps) {
    this.logger = deps.logger.child({ component: 'questions' });
  }

  /**
   * Return questions for `request`, from the cache when possible
   *
   * @throws {ApiError} BAD_REQUEST for an unknown model provider or model
   * @throws {QuestionGenerationError} When the set is not cached and cannot be generated
   */
  async lookupOrGenerate(request: QuestionRequest): Promise<QuestionLookup> {
    parseModelSelection(request.modelProvider, request.modelName);

    const { cache, generator, demand } = this.deps;
    const cacheKey = deriveCacheKey(request);

    const cached = await cache.get(cacheKey);
    if (cached) {
      return { source: 'cache', cacheKey, questions: cached };
    }

    demand?.recordMiss(request);

    let questions: Question[];
    try {
      questions = await generator.generate(request);
    } catch (error) {
      this.logger.error('questions.generate_failed', {
        cacheKey,
        request: describeRequest(request),
        error: errorMessage(error),
      });
      throw new QuestionGenerationError(undefined, { cause: error });
    }

    if (questions.length === 0) {
      this.logger.error('questions.generate_failed', {
        cacheKey,
        request: describeRequest(request),
        error: 'Generator returned no questions',
      });
      throw new QuestionGenerationError();
    }

    // A failed store leaves the request served; the next one regenerates
    await cache.set(cacheKey, questions);

    this.scheduleRelatedFill(request);
    return { source: 'generated', cacheKey, questions };
  }

  private scheduleRelatedFill(request: QuestionRequest): void {
    const { relatedFills, cache } = this.deps;
    if (!relatedFills || !cache.isEnabled()) {
      return;
    }

    const accepted = relatedFills.enqueue(relatedDifficulties(request));
    this.logger.debug('questions.related_fill_queued', { request: describeRequest(request), accepted });
  }
}
