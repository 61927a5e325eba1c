import { Hono } from 'hono';
import { formatTaskStatus, type TaskRegistry } from '../lib/task-registry.js';

export function createTaskRoutes(registry: TaskRegistry): Hono {
  const tasks = new Hono();

  tasks.get('/:taskId', (c) => {
    c.header('Cache-Control', 'no-store');
    const lookup = registry.get(c.req.param('taskId'));
    if (!lookup.found) {
      return c.json({ task_id: lookup.task_id, status: 'not_found', message: lookup.message }, 404);
    }

    const { task } = lookup;
    return c.json({
      task_id: task.task_id,
      kind: task.kind,
      client_id: task.client_id,
      status: formatTaskStatus(task),
      started_at: task.started_at,
      updated_at: task.updated_at,
      finished_at: task.finished_at,
      result: task.result,
      error: task.error,
    });
  });

  return tasks;
}
