/**
 * Bounded worker pool with a per-task timeout.
 *
 * A timed-out task is abandoned, not cancelled: its promise keeps running
 * but its result is ignored.
 */

export class TaskTimeoutError extends Error {
  code = "TASK_TIMEOUT" as const;

  constructor(readonly timeoutMs: number) {
    super(`Task timed out after ${String(timeoutMs)}ms`);
    this.name = "TaskTimeoutError";
  }
}

export type TaskOutcome<T> =
  | { ok: true; value: T }
  | { ok: false; error: Error; timedOut: boolean };

export interface PoolOptions {
  concurrency: number;
  timeoutMs: number;
}

async function settle<T>(
  task: () => Promise<T>,
  timeoutMs: number
): Promise<TaskOutcome<T>> {
  let timer: NodeJS.Timeout | undefined;

  const timeout = new Promise<TaskOutcome<T>>((resolve) => {
    timer = setTimeout(() => {
      resolve({
        ok: false,
        error: new TaskTimeoutError(timeoutMs),
        timedOut: true,
      });
    }, timeoutMs);
  });

  const run = task().then(
    (value): TaskOutcome<T> => ({ ok: true, value }),
    (error: unknown): TaskOutcome<T> => ({
      ok: false,
      error: error instanceof Error ? error : new Error(String(error)),
      timedOut: false,
    })
  );

  try {
    return await Promise.race([run, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Run every task with at most `concurrency` in flight. Resolves once each
 * task has settled or timed out; outcomes keep the input order.
 */
export async function runBounded<T>(
  tasks: readonly (() => Promise<T>)[],
  options: PoolOptions
): Promise<TaskOutcome<T>[]> {
  const outcomes = new Map<number, TaskOutcome<T>>();
  let next = 0;

  const worker = async (): Promise<void> => {
    while (next < tasks.length) {
      const index = next++;
      const task = tasks[index];
      if (task !== undefined) {
        outcomes.set(index, await settle(task, options.timeoutMs));
      }
    }
  };

  const workerCount = Math.max(1, Math.min(options.concurrency, tasks.length));
  await Promise.all(Array.from({ length: workerCount }, () => worker()));

  return tasks.map(
    (_, index): TaskOutcome<T> =>
      outcomes.get(index) ?? {
        ok: false,
        error: new Error(`Task ${String(index)} did not run`),
        timedOut: false,
      }
  );
}
