/**
 * Shared test doubles
 */

import { createLogger, type LogEntry, type Logger } from '../src/logger.js';
import { MemoryBackend } from '../src/storage/memory.js';
import type { GenerateOptions, QuestionGenerator } from '../src/generation/types.js';
import type { Question, QuestionRequest } from '../src/types.js';
import type { PregenerationConfig } from '../src/pregeneration/types.js';
import { DEFAULT_PEAK_WINDOWS } from '../src/pregeneration/predictor.js';

export function makeQuestions(count: number, tag: string = 'q'): Question[] {
  return Array.from({ length: count }, (_, index) => ({
    id: `${tag}-${index + 1}`,
    text: `Question ${index + 1} (${tag})`,
    options: ['A', 'B', 'C', 'D'],
    answer: 'A',
  }));
}

export type GenerateHandler = (request: QuestionRequest, options: GenerateOptions) => Promise<Question[]>;

/**
 * Generator stand-in that records every call
 */
export class StubGenerator implements QuestionGenerator {
  readonly calls: QuestionRequest[] = [];

  constructor(
    private handler: GenerateHandler = async (request) => makeQuestions(request.count, request.subject)
  ) {}

  setHandler(handler: GenerateHandler): void {
    this.handler = handler;
  }

  async generate(request: QuestionRequest, options: GenerateOptions = {}): Promise<Question[]> {
    this.calls.push(request);
    return this.handler(request, options);
  }
}

/**
 * Backend whose connection attempt always fails, as with an unreachable Redis
 */
export class UnreachableBackend extends MemoryBackend {
  override async connect(): Promise<void> {
    throw new Error('connect ECONNREFUSED 127.0.0.1:6379');
  }
}

/**
 * Logger that keeps its entries in memory
 */
export function captureLogger(): { logger: Logger; entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  return { logger: createLogger({ level: 'debug', sink: (entry) => entries.push(entry) }), entries };
}

export function pregenerationConfig(overrides: Partial<PregenerationConfig> = {}): PregenerationConfig {
  return {
    batchSize: 3,
    batchDelayMs: 0,
    escalatedBatchSize: 5,
    escalatedBatchDelayMs: 0,
    warmupCount: 5,
    warmupBatchSize: 2,
    peakWindows: DEFAULT_PEAK_WINDOWS.map((window) => ({ ...window })),
    escalateBelowHitRate: 70,
    maintainAboveHitRate: 90,
    adaptiveLimit: 10,
    ...overrides,
  };
}
