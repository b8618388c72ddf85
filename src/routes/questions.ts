import { Hono } from 'hono';
import type { Logger } from '../logger.js';
import { validateBody } from '../middleware/validation.js';
import type { QuestionService } from '../questions/QuestionService.js';
import { ApiError, errorMessage, handleApiError } from '../utils/errors.js';
import { questionRequestSchema, toQuestionRequest } from './schemas.js';

export function createQuestionRoutes(service: QuestionService, logger: Logger) {
  const questions = new Hono();

  /**
   * POST /questions
   * Serve a question set from the cache or generate it
   */
  questions.post('/', validateBody(questionRequestSchema), async (c) => {
    try {
      const result = await service.lookupOrGenerate(toQuestionRequest(c.get('validatedBody')));

      return c.json({
        source: result.source,
        cache_key: result.cacheKey,
        question_count: result.questions.length,
        questions: result.questions,
      });
    } catch (error) {
      if (!(error instanceof ApiError)) {
        logger.error('questions.request_failed', { error: errorMessage(error) });
      }
      return handleApiError(c, error, 'Failed to produce questions');
    }
  });

  return questions;
}
