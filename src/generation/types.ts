/**
 * Generation collaborator contract
 *
 * Produces question sets for a request. Implementations may be slow (seconds)
 * and may fail; callers own caching and error isolation.
 */

import type { Question, QuestionRequest } from '../types.js';

export interface GenerateOptions {
  /** Aborts the in-flight generation */
  signal?: AbortSignal;
}

export interface QuestionGenerator {
  /**
   * Generate questions for a request
   *
   * @throws Error on network, quota or malformed-output failures
   */
  generate(request: QuestionRequest, options?: GenerateOptions): Promise<Question[]>;
}
