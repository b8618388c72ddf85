/**
 * Fill Queue
 *
 * Collects configurations to pre-generate from the request path and drains
 * them through a single background task. The consumer hands each drained
 * group to `schedulePregeneration`, so at most `batchSize` generations run
 * at once no matter how many requests enqueue work.
 */

import { deriveCacheKey } from '../cache/CacheKey.js';
import type { Logger } from '../logger.js';
import type { TaskRunner } from '../tasks/TaskRunner.js';
import type { QuestionRequest } from '../types.js';
import { errorMessage } from '../utils/errors.js';
import type { PreGenerationAgent } from './PreGenerationAgent.js';

export interface FillQueueOptions {
  /** Name of the consumer task (default: 'related-fill') */
  taskName?: string;
  /** Configurations waiting beyond this are dropped (default: 100) */
  maxPending?: number;
}

export class FillQueue {
  private pending: QuestionRequest[] = [];
  // Cache keys either waiting or in the group being filled
  private queued: Set<string> = new Set();
  private consumerId: string | null = null;
  private readonly logger: Logger;
  private readonly taskName: string;
  private readonly maxPending: number;

  constructor(
    private readonly agent: PreGenerationAgent,
    private readonly tasks: TaskRunner,
    logger: Logger,
    options: FillQueueOptions = {}
  ) {
    this.logger = logger.child({ component: 'fill-queue' });
    this.taskName = options.taskName ?? 'related-fill';
    this.maxPending = options.maxPending ?? 100;
  }

  /**
   * Queue configurations for background filling
   *
   * Configurations already waiting or being filled are ignored.
   *
   * @returns Number of configurations accepted; 0 once the task runner has shut down
   */
  enqueue(configs: readonly QuestionRequest[]): number {
    let accepted = 0;
    for (const config of configs) {
      const cacheKey = deriveCacheKey(config);
      if (this.queued.has(cacheKey)) {
        continue;
      }
      if (this.pending.length >= this.maxPending) {
        this.logger.warn('fill_queue.full', { dropped: cacheKey, maxPending: this.maxPending });
        continue;
      }
      this.queued.add(cacheKey);
      this.pending.push(config);
      accepted++;
    }

    if (accepted > 0 && !this.ensureConsumer()) {
      return 0;
    }
    return accepted;
  }

  pendingCount(): number {
    return this.pending.length;
  }

  /** Id of the running consumer task, if any */
  consumerTaskId(): string | null {
    return this.consumerId;
  }

  private ensureConsumer(): boolean {
    if (this.consumerId) {
      return true;
    }

    try {
      const handle = this.tasks.submit(this.taskName, (signal) => this.drain(signal));
      this.consumerId = handle.id;
      return true;
    } catch (error) {
      this.logger.warn('fill_queue.consumer_not_started', {
        error: errorMessage(error),
        discarded: this.pending.length,
      });
      this.reset();
      return false;
    }
  }

  private async drain(signal: AbortSignal): Promise<void> {
    try {
      while (this.pending.length > 0 && !signal.aborted) {
        const group = this.pending.splice(0);
        try {
          await this.agent.schedulePregeneration(group, { signal });
        } finally {
          for (const config of group) {
            this.queued.delete(deriveCacheKey(config));
          }
        }
      }
    } finally {
      if (signal.aborted) {
        this.reset();
      }
      this.consumerId = null;
    }
  }

  private reset(): void {
    this.pending = [];
    this.queued.clear();
  }
}
