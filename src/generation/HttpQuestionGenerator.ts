/**
 * HTTP Question Generator
 *
 * Calls the retrieval/generation service over HTTP. The service receives the
 * request as JSON at `POST {baseUrl}/generate` and answers with either a list
 * of question objects or `{ "questions": [...] }`.
 */

import { z } from 'zod';
import type { GenerateOptions, QuestionGenerator } from './types.js';
import type { Question, QuestionRequest } from '../types.js';
import { parseModelSelection, type ModelSelection } from '../models/providers.js';
import { GeneratorResponseError } from '../utils/errors.js';
import { linkSignals } from '../utils/abort.js';

export interface HttpGeneratorConfig {
  /** Base URL of the generation service, e.g. http://localhost:8000 */
  baseUrl: string;
  /** Per-request timeout in milliseconds */
  timeoutMs: number;
  /** Model used when a request names none */
  defaultModel?: ModelSelection;
  /** Fetch implementation (defaults to the global fetch) */
  fetch?: typeof fetch;
}

const questionSchema = z.record(z.unknown());

const generatorResponseSchema = z.union([
  z.array(questionSchema),
  z.object({ questions: z.array(questionSchema) }),
]);

/**
 * Wire format of a generation request
 */
export interface GenerateRequestBody {
  subject: string;
  difficulty: string;
  count: number;
  exam_type: string | null;
  model_provider: string | null;
  model_name: string | null;
}

export class HttpQuestionGenerator implements QuestionGenerator {
  private readonly fetchImpl: typeof fetch;
  private readonly endpoint: string;

  constructor(private readonly config: HttpGeneratorConfig) {
    this.fetchImpl = config.fetch ?? fetch;
    this.endpoint = `${config.baseUrl.replace(/\/+$/, '')}/generate`;
  }

  async generate(request: QuestionRequest, options: GenerateOptions = {}): Promise<Question[]> {
    const model = parseModelSelection(request.modelProvider, request.modelName) ?? this.config.defaultModel;

    const body: GenerateRequestBody = {
      subject: request.subject.trim(),
      difficulty: request.difficulty.trim(),
      count: request.count,
      exam_type: request.examType ?? null,
      model_provider: model?.provider ?? null,
      model_name: model?.model ?? null,
    };

    const { signal, dispose } = linkSignals([options.signal], this.config.timeoutMs);

    try {
      const response = await this.fetchImpl(this.endpoint, {
        method: 'POST',
        headers: { 'content-type': 'application/json', accept: 'application/json' },
        body: JSON.stringify(body),
        signal,
      });

      if (!response.ok) {
        throw new GeneratorResponseError(`Generator responded with status ${response.status}`, response.status);
      }

      let payload: unknown;
      try {
        payload = await response.json();
      } catch {
        throw new GeneratorResponseError('Generator response is not valid JSON', response.status);
      }

      const parsed = generatorResponseSchema.safeParse(payload);
      if (!parsed.success) {
        throw new GeneratorResponseError('Generator response is not a list of questions', response.status);
      }

      const questions = Array.isArray(parsed.data) ? parsed.data : parsed.data.questions;
      if (questions.length === 0) {
        throw new GeneratorResponseError('Generator returned no questions', response.status);
      }

      return questions;
    } finally {
      dispose();
    }
  }
}
