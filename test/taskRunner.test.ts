import { describe, it, expect, beforeEach } from 'vitest';
import { TaskRunner } from '../src/tasks/TaskRunner.js';
import { createSilentLogger } from '../src/logger.js';
import { sleep } from '../src/utils/abort.js';

describe('TaskRunner', () => {
  let runner: TaskRunner;

  beforeEach(() => {
    runner = new TaskRunner(createSilentLogger());
  });

  it('should record a completed task', async () => {
    const handle = runner.submit('noop', async () => 'done');

    expect(handle.id).toMatch(/^[0-9a-z]{26}$/);
    expect(handle.status).toBe('running');
    expect(runner.runningCount()).toBe(1);

    expect(await handle.done).toBe('completed');
    expect(runner.get(handle.id)).toMatchObject({ name: 'noop', status: 'completed', error: null });
    expect(runner.get(handle.id)?.finishedAt).toEqual(expect.any(String));
    expect(runner.runningCount()).toBe(0);
  });

  it('should record a failed task without rejecting', async () => {
    const handle = runner.submit('broken', async () => {
      throw new Error('generator unreachable');
    });

    expect(await handle.done).toBe('failed');
    expect(runner.get(handle.id)).toMatchObject({ status: 'failed', error: 'generator unreachable' });
  });

  it('should cancel a running task through its signal', async () => {
    const handle = runner.submit('long', (signal) => sleep(60_000, signal));

    expect(runner.cancel(handle.id)).toBe(true);
    expect(await handle.done).toBe('cancelled');
    expect(runner.cancel(handle.id)).toBe(false);
    expect(runner.cancel('unknown')).toBe(false);
  });

  it('should treat an error raised after cancellation as cancelled', async () => {
    const handle = runner.submit('aborting', async (signal) => {
      await sleep(60_000, signal);
      throw new Error('aborted');
    });

    runner.cancel(handle.id);

    expect(await handle.done).toBe('cancelled');
    expect(runner.get(handle.id)?.error).toBeNull();
  });

  it('should cancel everything on shutdown and refuse new work', async () => {
    const first = runner.submit('a', (signal) => sleep(60_000, signal));
    const second = runner.submit('b', (signal) => sleep(60_000, signal));

    await runner.shutdown();

    expect(first.status).toBe('cancelled');
    expect(second.status).toBe('cancelled');
    expect(() => runner.submit('late', async () => undefined)).toThrow('Task runner is shut down');
  });

  it('should keep a bounded history of finished tasks', async () => {
    const bounded = new TaskRunner(createSilentLogger(), { historyLimit: 2 });

    for (const name of ['one', 'two', 'three']) {
      await bounded.submit(name, async () => undefined).done;
    }

    expect(bounded.list().map((task) => task.name)).toEqual(['two', 'three']);
  });
});
