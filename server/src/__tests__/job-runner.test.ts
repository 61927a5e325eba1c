import { describe, it, expect, afterEach } from 'vitest';
import { createConcurrencyLimiter } from '../lib/concurrency.js';
import { JobRunner } from '../lib/job-runner.js';
import { TaskRegistry } from '../lib/task-registry.js';

function deferred<T>() {
  let resolve: (value: T) => void = () => {};
  const promise = new Promise<T>((res) => {
    resolve = res;
  });
  return { promise, resolve };
}

describe('createConcurrencyLimiter', () => {
  it('runs at most `limit` tasks at once in FIFO order', async () => {
    const limit = createConcurrencyLimiter(2);
    const gates = [deferred<void>(), deferred<void>(), deferred<void>()];
    const started: number[] = [];

    const runs = gates.map((gate, i) => limit(async () => {
      started.push(i);
      await gate.promise;
      return i;
    }));

    await Promise.resolve();
    expect(started).toEqual([0, 1]);
    expect(limit.stats()).toEqual({ active: 2, queued: 1, limit: 2 });

    gates[0].resolve();
    await runs[0];
    await Promise.resolve();
    expect(started).toEqual([0, 1, 2]);

    gates[1].resolve();
    gates[2].resolve();
    await expect(Promise.all(runs)).resolves.toEqual([0, 1, 2]);
    expect(limit.stats()).toEqual({ active: 0, queued: 0, limit: 2 });
  });

  it('releases the slot when a task throws', async () => {
    const limit = createConcurrencyLimiter(1);
    await expect(limit(async () => {
      throw new Error('boom');
    })).rejects.toThrow('boom');
    await expect(limit(async () => 'next')).resolves.toBe('next');
  });
});

describe('JobRunner', () => {
  const registry = new TaskRegistry({ gracePeriodMs: 60_000 });

  afterEach(() => {
    registry.dispose();
  });

  it('records a completed job with its result', async () => {
    const runner = new JobRunner(registry, 2);
    const task = registry.create('ingestion', 'client-1');

    await runner.submit(task, async ({ taskId }) => ({ stored_count: 2, taskId }));

    const lookup = registry.get(task.task_id);
    if (!lookup.found) throw new Error('task missing');
    expect(lookup.task.status).toBe('completed');
    expect(lookup.task.result).toEqual({ stored_count: 2, taskId: task.task_id });
  });

  it('turns a job error into a failed task without rejecting', async () => {
    const runner = new JobRunner(registry, 2);
    const task = registry.create('generation', 'client-1');

    await expect(runner.submit(task, async () => {
      throw new Error('engine unavailable');
    })).resolves.toBeUndefined();

    const lookup = registry.get(task.task_id);
    if (!lookup.found) throw new Error('task missing');
    expect(lookup.task.status).toBe('failed');
    expect(lookup.task.error).toBe('engine unavailable');
  });

  it('keeps a queued job pending until a slot frees up', async () => {
    const runner = new JobRunner(registry, 1);
    const gate = deferred<void>();
    const first = registry.create('ingestion', 'client-1');
    const second = registry.create('ingestion', 'client-2');

    const firstRun = runner.submit(first, () => gate.promise);
    const secondRun = runner.submit(second, async () => 'done');
    await Promise.resolve();

    const running = registry.get(first.task_id);
    const waiting = registry.get(second.task_id);
    expect(running.found && running.task.status).toBe('running');
    expect(waiting.found && waiting.task.status).toBe('pending');
    expect(runner.stats()).toMatchObject({ active: 1, queued: 1, in_flight: 2 });

    gate.resolve();
    await Promise.all([firstRun, secondRun]);
    await runner.drain();
    expect(runner.stats().in_flight).toBe(0);
  });
});
