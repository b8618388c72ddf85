/**
 * Task Runner
 *
 * Owns the background work of the process (warm-up, the periodic
 * pre-generation loop, related-difficulty fills, operator-triggered warms).
 * Every task gets an id, an abort signal and a recorded outcome, so nothing
 * runs unobserved and shutdown can wait for all of it.
 */

import type { Logger } from '../logger.js';
import { errorMessage } from '../utils/errors.js';
import { generateId } from '../utils/ulid.js';

export type TaskStatus = 'running' | 'completed' | 'failed' | 'cancelled';

export type TaskWork = (signal: AbortSignal) => Promise<unknown>;

/**
 * Public view of a task
 */
export interface TaskSummary {
  id: string;
  name: string;
  status: TaskStatus;
  startedAt: string;
  finishedAt: string | null;
  error: string | null;
}

export interface TaskHandle extends TaskSummary {
  /** Settles with the final status once the task is over; never rejects */
  done: Promise<TaskStatus>;
}

interface TaskRecord {
  handle: TaskHandle;
  controller: AbortController;
}

export interface TaskRunnerOptions {
  /** Finished tasks kept for listing (default: 100) */
  historyLimit?: number;
}

export class TaskRunner {
  private tasks: Map<string, TaskRecord> = new Map();
  private readonly historyLimit: number;
  private closed: boolean = false;

  constructor(
    private readonly logger: Logger,
    options: TaskRunnerOptions = {}
  ) {
    this.historyLimit = options.historyLimit ?? 100;
  }

  /**
   * Start `work` in the background
   *
   * @throws {Error} If the runner has been shut down
   */
  submit(name: string, work: TaskWork): TaskHandle {
    if (this.closed) {
      throw new Error(`Task runner is shut down; cannot start ${name}`);
    }

    const controller = new AbortController();
    const id = generateId();
    const log = this.logger.child({ taskId: id, task: name });

    const handle: TaskHandle = {
      id,
      name,
      status: 'running',
      startedAt: new Date().toISOString(),
      finishedAt: null,
      error: null,
      done: Promise.resolve('running'),
    };

    log.info('task.started');

    handle.done = this.execute(work, controller.signal).then(({ status, error }) => {
      handle.status = status;
      handle.error = error;
      handle.finishedAt = new Date().toISOString();

      if (status === 'failed') {
        log.error('task.failed', { error });
      } else {
        log.info(`task.${status}`);
      }

      this.pruneHistory();
      return status;
    });

    this.tasks.set(id, { handle, controller });
    return handle;
  }

  get(id: string): TaskSummary | undefined {
    const record = this.tasks.get(id);
    return record ? summarize(record.handle) : undefined;
  }

  /**
   * All known tasks, oldest first
   */
  list(): TaskSummary[] {
    return Array.from(this.tasks.values(), (record) => summarize(record.handle));
  }

  runningCount(): number {
    let count = 0;
    for (const record of this.tasks.values()) {
      if (record.handle.status === 'running') count++;
    }
    return count;
  }

  /**
   * Request cancellation of a running task
   *
   * @returns false when the task is unknown or already finished
   */
  cancel(id: string): boolean {
    const record = this.tasks.get(id);
    if (!record || record.handle.status !== 'running') {
      return false;
    }
    record.controller.abort();
    return true;
  }

  /**
   * Cancel every running task and wait for all of them to settle
   */
  async shutdown(): Promise<void> {
    this.closed = true;
    const running = Array.from(this.tasks.values()).filter((record) => record.handle.status === 'running');

    for (const record of running) {
      record.controller.abort();
    }

    await Promise.all(running.map((record) => record.handle.done));
    this.logger.info('task.runner.stopped', { cancelled: running.length });
  }

  private async execute(
    work: TaskWork,
    signal: AbortSignal
  ): Promise<{ status: Exclude<TaskStatus, 'running'>; error: string | null }> {
    try {
      await work(signal);
      return { status: signal.aborted ? 'cancelled' : 'completed', error: null };
    } catch (error) {
      if (signal.aborted) {
        return { status: 'cancelled', error: null };
      }
      return { status: 'failed', error: errorMessage(error) };
    }
  }

  // Drop the oldest finished tasks beyond the history limit
  private pruneHistory(): void {
    let finished = 0;
    for (const record of this.tasks.values()) {
      if (record.handle.status !== 'running') finished++;
    }

    for (const [id, record] of this.tasks) {
      if (finished <= this.historyLimit) break;
      if (record.handle.status !== 'running') {
        this.tasks.delete(id);
        finished--;
      }
    }
  }
}

function summarize(handle: TaskHandle): TaskSummary {
  return {
    id: handle.id,
    name: handle.name,
    status: handle.status,
    startedAt: handle.startedAt,
    finishedAt: handle.finishedAt,
    error: handle.error,
  };
}
