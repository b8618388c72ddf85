/**
 * Cache Key Generator
 *
 * Turns question-request parameters into deterministic cache keys of the form
 * `questions:{hash}:{subject}:{difficulty}:{count}:{examType}:{provider}:{model}`.
 * The canonical tuple stays readable in the key; the hash prefix keeps two
 * tuples apart even when a field itself contains the delimiter.
 */

import { createHash } from 'node:crypto';
import type { QuestionRequest } from '../types.js';

export const CACHE_KEY_PREFIX = 'questions';
export const METADATA_KEY_PREFIX = 'metadata';
export const DEFAULT_CACHE_PATTERN = `${CACHE_KEY_PREFIX}:*`;

const DELIMITER = ':';
const HASH_LENGTH = 12;

function normalize(value: string | undefined, fallback: string): string {
  const trimmed = value?.trim().toLowerCase();
  return trimmed ? trimmed : fallback;
}

/**
 * Builds the canonical, delimiter-joined form of a request
 *
 * @example
 * ```ts
 * canonicalizeRequest({ subject: ' Physics', difficulty: 'Medium', count: 30, examType: 'IIT_JEE' });
 * // 'physics:medium:30:iit_jee:default:default'
 * ```
 */
export function canonicalizeRequest(request: QuestionRequest): string {
  return [
    normalize(request.subject, ''),
    normalize(request.difficulty, ''),
    String(request.count),
    normalize(request.examType, 'general'),
    normalize(request.modelProvider, 'default'),
    normalize(request.modelName, 'default'),
  ].join(DELIMITER);
}

/**
 * Generates a cache key from request parameters
 *
 * Pure function of its input: equal requests (modulo case and surrounding
 * whitespace) always yield the same key.
 */
export function deriveCacheKey(request: QuestionRequest): string {
  const canonical = canonicalizeRequest(request);
  const hash = createHash('md5').update(canonical).digest('hex').slice(0, HASH_LENGTH);
  return `${CACHE_KEY_PREFIX}${DELIMITER}${hash}${DELIMITER}${canonical}`;
}

/**
 * Key of the access-metadata hash that accompanies a cache entry
 */
export function metadataKeyFor(cacheKey: string): string {
  return `${METADATA_KEY_PREFIX}${DELIMITER}${cacheKey}`;
}
