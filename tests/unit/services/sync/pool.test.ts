import { describe, it, expect } from "vitest";

import {
  TaskTimeoutError,
  runBounded,
} from "../../../../src/services/sync/pool.js";

const delay = (ms: number) =>
  new Promise<void>((resolve) => setTimeout(resolve, ms));

describe("services/sync/pool", () => {
  it("should return outcomes in input order", async () => {
    const outcomes = await runBounded(
      [
        async () => {
          await delay(20);
          return "slow";
        },
        () => Promise.resolve("fast"),
      ],
      { concurrency: 2, timeoutMs: 1000 }
    );

    expect(outcomes).toEqual([
      { ok: true, value: "slow" },
      { ok: true, value: "fast" },
    ]);
  });

  it("should never run more tasks than the concurrency", async () => {
    let running = 0;
    let peak = 0;
    const tasks = Array.from({ length: 6 }, (_, index) => async () => {
      running++;
      peak = Math.max(peak, running);
      await delay(5);
      running--;
      return index;
    });

    const outcomes = await runBounded(tasks, { concurrency: 2, timeoutMs: 1000 });

    expect(peak).toBe(2);
    expect(outcomes.map((outcome) => outcome.ok)).toEqual(
      Array.from({ length: 6 }, () => true)
    );
  });

  it("should capture failures without affecting other tasks", async () => {
    const outcomes = await runBounded(
      [
        () => Promise.reject(new Error("endpoint down")),
        () => Promise.resolve(1),
      ],
      { concurrency: 1, timeoutMs: 1000 }
    );

    const [failed, passed] = outcomes;
    expect(failed).toMatchObject({ ok: false, timedOut: false });
    if (failed?.ok === false) {
      expect(failed.error.message).toBe("endpoint down");
    }
    expect(passed).toEqual({ ok: true, value: 1 });
  });

  it("should time out slow tasks", async () => {
    const outcomes = await runBounded(
      [() => delay(200).then(() => "late")],
      { concurrency: 1, timeoutMs: 10 }
    );

    const [outcome] = outcomes;
    expect(outcome).toMatchObject({ ok: false, timedOut: true });
    if (outcome?.ok === false) {
      expect(outcome.error).toBeInstanceOf(TaskTimeoutError);
      expect(outcome.error.message).toBe("Task timed out after 10ms");
    }
  });

  it("should resolve immediately without tasks", async () => {
    expect(await runBounded([], { concurrency: 3, timeoutMs: 10 })).toEqual([]);
  });
});
