/**
 * Request body schemas shared by the routes
 *
 * Field names on the wire are snake_case; the services take camelCase.
 */

import { z } from 'zod';
import { CACHE_KEY_PREFIX } from '../cache/CacheKey.js';
import type { QuestionRequest } from '../types.js';

export const questionRequestSchema = z.object({
  subject: z.string().trim().min(1).max(100),
  difficulty: z.string().trim().min(1).max(50),
  count: z.number().int().min(1).max(200),
  exam_type: z.string().trim().min(1).max(50).optional(),
  model_provider: z.string().trim().min(1).max(50).optional(),
  model_name: z.string().trim().min(1).max(100).optional(),
});

export type QuestionRequestBody = z.infer<typeof questionRequestSchema>;

export const warmRequestSchema = z.object({
  configurations: z.array(questionRequestSchema).min(1).max(100).optional(),
  batch_size: z.number().int().min(1).max(20).optional(),
});

export const invalidateQuerySchema = z.object({
  pattern: z
    .string()
    .trim()
    .min(1)
    .refine((pattern) => pattern.startsWith(`${CACHE_KEY_PREFIX}:`), {
      message: `Pattern must start with "${CACHE_KEY_PREFIX}:"`,
    })
    .optional(),
});

export function toQuestionRequest(body: QuestionRequestBody): QuestionRequest {
  return {
    subject: body.subject,
    difficulty: body.difficulty,
    count: body.count,
    examType: body.exam_type,
    modelProvider: body.model_provider,
    modelName: body.model_name,
  };
}
