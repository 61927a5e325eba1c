import { randomUUID } from 'node:crypto';
import logger from './logger.js';

export type TaskKind = 'ingestion' | 'generation';
export type TaskStatus = 'pending' | 'running' | 'completed' | 'failed';

export interface PipelineTask {
  task_id: string;
  kind: TaskKind;
  client_id: string;
  status: TaskStatus;
  started_at: string;
  updated_at: string;
  finished_at: string | null;
  result: unknown;
  error: string | null;
}

export type TaskLookup =
  | { found: true; task: PipelineTask }
  | { found: false; task_id: string; message: string };

/** Storage seam for task entries; swap for a shared store when running several instances. */
export interface TaskStore {
  get(taskId: string): PipelineTask | undefined;
  set(task: PipelineTask): void;
  delete(taskId: string): boolean;
  values(): Iterable<PipelineTask>;
}

export class InMemoryTaskStore implements TaskStore {
  private readonly tasks = new Map<string, PipelineTask>();

  get(taskId: string): PipelineTask | undefined {
    return this.tasks.get(taskId);
  }

  set(task: PipelineTask): void {
    this.tasks.set(task.task_id, task);
  }

  delete(taskId: string): boolean {
    return this.tasks.delete(taskId);
  }

  values(): Iterable<PipelineTask> {
    return this.tasks.values();
  }
}

const ALLOWED_TRANSITIONS: Record<TaskStatus, TaskStatus[]> = {
  pending: ['running', 'failed'],
  running: ['completed', 'failed'],
  completed: [],
  failed: [],
};

export const TASK_NOT_FOUND_MESSAGE = 'Task not found or already cleaned up';

export interface TaskRegistryOptions {
  store?: TaskStore;
  gracePeriodMs: number;
  now?: () => Date;
}

/**
 * Lifecycle of asynchronously triggered jobs: pending → running →
 * completed | failed. Every update is a synchronous read-modify-write of one
 * entry, and reads hand out copies, so pollers never observe a torn state.
 */
export class TaskRegistry {
  private readonly store: TaskStore;
  private readonly gracePeriodMs: number;
  private readonly now: () => Date;
  private readonly cleanupTimers = new Map<string, ReturnType<typeof setTimeout>>();

  constructor(options: TaskRegistryOptions) {
    this.store = options.store ?? new InMemoryTaskStore();
    this.gracePeriodMs = options.gracePeriodMs;
    this.now = options.now ?? (() => new Date());
  }

  create(kind: TaskKind, clientId: string): PipelineTask {
    const timestamp = this.now().toISOString();
    const task: PipelineTask = {
      task_id: randomUUID(),
      kind,
      client_id: clientId,
      status: 'pending',
      started_at: timestamp,
      updated_at: timestamp,
      finished_at: null,
      result: null,
      error: null,
    };
    this.store.set(task);
    return { ...task };
  }

  get(taskId: string): TaskLookup {
    const task = this.store.get(taskId);
    if (!task) {
      return { found: false, task_id: taskId, message: TASK_NOT_FOUND_MESSAGE };
    }
    return { found: true, task: { ...task } };
  }

  markRunning(taskId: string): boolean {
    return this.transition(taskId, 'running', {});
  }

  complete(taskId: string, result: unknown): boolean {
    return this.transition(taskId, 'completed', { result });
  }

  fail(taskId: string, reason: string): boolean {
    return this.transition(taskId, 'failed', { error: reason });
  }

  /** Non-terminal task of `kind` for a client, if one exists. */
  findActive(kind: TaskKind, clientId: string): PipelineTask | null {
    for (const task of this.store.values()) {
      if (task.kind === kind && task.client_id === clientId && !isTerminal(task.status)) {
        return { ...task };
      }
    }
    return null;
  }

  stats(): Record<TaskStatus, number> {
    const counts: Record<TaskStatus, number> = { pending: 0, running: 0, completed: 0, failed: 0 };
    for (const task of this.store.values()) {
      counts[task.status] += 1;
    }
    return counts;
  }

  /** Cancels pending cleanup timers; used on shutdown and in tests. */
  dispose(): void {
    for (const timer of this.cleanupTimers.values()) {
      clearTimeout(timer);
    }
    this.cleanupTimers.clear();
  }

  private transition(
    taskId: string,
    next: TaskStatus,
    patch: Partial<Pick<PipelineTask, 'result' | 'error'>>,
  ): boolean {
    const current = this.store.get(taskId);
    if (!current) {
      logger.warn({ task_id: taskId, next }, 'Transition requested for unknown task');
      return false;
    }
    if (!ALLOWED_TRANSITIONS[current.status].includes(next)) {
      logger.warn({ task_id: taskId, from: current.status, to: next }, 'Ignoring invalid task transition');
      return false;
    }

    const timestamp = this.now().toISOString();
    this.store.set({
      ...current,
      ...patch,
      status: next,
      updated_at: timestamp,
      finished_at: isTerminal(next) ? timestamp : current.finished_at,
    });
    if (isTerminal(next)) {
      this.scheduleCleanup(taskId);
    }
    return true;
  }

  private scheduleCleanup(taskId: string): void {
    const timer = setTimeout(() => {
      this.cleanupTimers.delete(taskId);
      this.store.delete(taskId);
    }, this.gracePeriodMs);
    timer.unref?.();
    this.cleanupTimers.set(taskId, timer);
  }
}

export function isTerminal(status: TaskStatus): boolean {
  return status === 'completed' || status === 'failed';
}

/** Wire form of a task status; failures carry their reason. */
export function formatTaskStatus(task: PipelineTask): string {
  return task.status === 'failed' ? `failed:${task.error ?? 'unknown error'}` : task.status;
}
