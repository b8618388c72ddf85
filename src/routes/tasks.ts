import { Hono } from 'hono';
import type { TaskRunner, TaskSummary } from '../tasks/TaskRunner.js';
import { notFoundError } from '../utils/errors.js';

function toResponse(task: TaskSummary) {
  return {
    id: task.id,
    name: task.name,
    status: task.status,
    started_at: task.startedAt,
    finished_at: task.finishedAt,
    error: task.error,
  };
}

export function createTaskRoutes(runner: TaskRunner) {
  const tasks = new Hono();

  /**
   * GET /tasks
   * Running tasks and recent history, oldest first
   */
  tasks.get('/', (c) => {
    return c.json({ tasks: runner.list().map(toResponse) });
  });

  tasks.get('/:id', (c) => {
    const id = c.req.param('id');
    const task = runner.get(id);
    if (!task) {
      return notFoundError(c, 'Task', id);
    }
    return c.json(toResponse(task));
  });

  /**
   * DELETE /tasks/:id
   * Request cancellation of a running task
   */
  tasks.delete('/:id', (c) => {
    const id = c.req.param('id');
    const task = runner.get(id);
    if (!task) {
      return notFoundError(c, 'Task', id);
    }
    return c.json({ id, cancelled: runner.cancel(id) });
  });

  return tasks;
}
