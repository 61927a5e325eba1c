import { createConcurrencyLimiter, type LimiterStats } from './concurrency.js';
import { errorMessage } from './errors.js';
import { createTaskLogger, type Logger } from './logger.js';
import type { PipelineTask, TaskRegistry } from './task-registry.js';

export type JobWork<T> = (ctx: { taskId: string; log: Logger }) => Promise<T>;

/**
 * Runs triggered jobs off the request path through a bounded pool and records
 * every outcome on the task registry. Job errors end as `failed` tasks; they
 * are never rethrown to the caller.
 */
export class JobRunner {
  private readonly registry: TaskRegistry;
  private readonly limit: ReturnType<typeof createConcurrencyLimiter>;
  private readonly inFlight = new Set<Promise<void>>();

  constructor(registry: TaskRegistry, concurrency: number) {
    this.registry = registry;
    this.limit = createConcurrencyLimiter(concurrency);
  }

  /** Resolves once the job has settled; request handlers do not wait on it. */
  submit<T>(task: PipelineTask, work: JobWork<T>): Promise<void> {
    const log = createTaskLogger(task.task_id, { kind: task.kind, client_id: task.client_id });

    const run = this.limit(async () => {
      this.registry.markRunning(task.task_id);
      log.info('Task started');
      return work({ taskId: task.task_id, log });
    })
      .then((result) => {
        this.registry.complete(task.task_id, result);
        log.info('Task completed');
      })
      .catch((error: unknown) => {
        const reason = errorMessage(error);
        this.registry.fail(task.task_id, reason);
        log.error({ error: reason }, 'Task failed');
      })
      .finally(() => {
        this.inFlight.delete(run);
      });

    this.inFlight.add(run);
    return run;
  }

  /** Shares the pool with non-task work such as the scheduled sweep. */
  readonly run = <T>(work: () => Promise<T>): Promise<T> => this.limit(work);

  async drain(): Promise<void> {
    await Promise.allSettled([...this.inFlight]);
  }

  stats(): LimiterStats & { in_flight: number } {
    return { ...this.limit.stats(), in_flight: this.inFlight.size };
  }
}
