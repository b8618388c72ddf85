/**
 * Shared domain types
 */

/**
 * A generated question. Its shape belongs to the generator; the cache only
 * needs it to be JSON-serializable.
 */
export type Question = Record<string, unknown>;

export type Difficulty = 'Easy' | 'Medium' | 'Hard';

export const DIFFICULTIES: readonly Difficulty[] = ['Easy', 'Medium', 'Hard'];

/**
 * Parameters of a question-set request. Text fields are compared
 * case-insensitively once they reach the cache key.
 */
export interface QuestionRequest {
  subject: string;
  difficulty: string;
  count: number;
  examType?: string;
  modelProvider?: string;
  modelName?: string;
}

/**
 * A request pattern worth keeping warm. Lists of these are ordered
 * most-popular first.
 */
export interface PriorityConfiguration extends QuestionRequest {
  difficulty: Difficulty;
  examType: string;
}

/**
 * Short human-readable label for logs, e.g. `Physics/Medium/30/IIT_JEE`
 */
export function describeRequest(request: QuestionRequest): string {
  const parts = [request.subject, request.difficulty, String(request.count), request.examType ?? 'general'];
  if (request.modelProvider) {
    parts.push(request.modelName ? `${request.modelProvider}:${request.modelName}` : request.modelProvider);
  }
  return parts.join('/');
}
