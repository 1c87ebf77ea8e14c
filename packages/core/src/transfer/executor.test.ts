import { describe, it, expect, vi } from "vitest";
import { OverfullError, UnderfullError } from "../errors/catalog.js";
import {
  collectThenDoWithProgress,
  doWithProgress,
  type TransferTask,
} from "./executor.js";

function tick(): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, 1));
}

/** Tasks that record how many of them run at once. */
function trackedTasks(n: number) {
  const stats = { inFlight: 0, maxInFlight: 0, started: 0 };
  const tasks: TransferTask<number>[] = Array.from({ length: n }, (_, i) => ({
    label: `task-${i}`,
    async run() {
      stats.started++;
      stats.inFlight++;
      stats.maxInFlight = Math.max(stats.maxInFlight, stats.inFlight);
      await tick();
      stats.inFlight--;
      return i;
    },
  }));
  return { tasks, stats };
}

function failing(label: string, error: unknown): TransferTask<number> {
  return {
    label,
    async run() {
      throw error;
    },
  };
}

describe("doWithProgress", () => {
  it("keeps at most `concurrency` tasks in flight", async () => {
    const { tasks, stats } = trackedTasks(10);

    const report = await doWithProgress(tasks, { length: 10, concurrency: 3 });

    expect(stats.maxInFlight).toBe(3);
    expect(report.completed).toBe(10);
    expect([...report.results].sort((a, b) => a - b)).toEqual([
      0, 1, 2, 3, 4, 5, 6, 7, 8, 9,
    ]);
    expect(report.failures).toEqual([]);
  });

  it("reports progress after every completion", async () => {
    const { tasks } = trackedTasks(4);
    const onProgress = vi.fn();

    await doWithProgress(tasks, { length: 4, concurrency: 2, onProgress });

    expect(onProgress.mock.calls).toEqual([
      [1, 4],
      [2, 4],
      [3, 4],
      [4, 4],
    ]);
  });

  it("pulls lazily from an async source", async () => {
    const { tasks, stats } = trackedTasks(5);
    let pulled = 0;
    async function* source() {
      for (const task of tasks) {
        pulled++;
        expect(pulled - stats.started).toBeLessThanOrEqual(1);
        yield task;
      }
    }

    const report = await doWithProgress(source(), { length: 5, concurrency: 2 });

    expect(report.completed).toBe(5);
    expect(stats.maxInFlight).toBe(2);
  });

  it("fails when the source produces more than declared", async () => {
    const { tasks, stats } = trackedTasks(10);

    await expect(
      doWithProgress(tasks, { length: 9, concurrency: 3 }),
    ).rejects.toBeInstanceOf(OverfullError);
    expect(stats.started).toBe(9);
  });

  it("fails when the source produces fewer than declared", async () => {
    const { tasks } = trackedTasks(10);

    const err = await doWithProgress(tasks, { length: 11, concurrency: 3 }).catch(
      (e: unknown) => e,
    );

    expect(err).toBeInstanceOf(UnderfullError);
    expect(err).toMatchObject({ expected: 11, actual: 10 });
  });

  it("aborts on the first failure by default", async () => {
    const boom = new Error("boom");

    await expect(
      collectThenDoWithProgress([failing("a", boom)], { concurrency: 1 }),
    ).rejects.toBe(boom);
  });

  it("records failures the policy keeps", async () => {
    const { tasks } = trackedTasks(3);
    const boom = new Error("boom");

    const report = await collectThenDoWithProgress(
      [...tasks, failing("bad", boom)],
      { concurrency: 2, failPolicy: () => "record" },
    );

    expect(report.completed).toBe(4);
    expect(report.results).toHaveLength(3);
    expect(report.failures).toEqual([{ id: 3, label: "bad", error: boom }]);
  });

  it("propagates an error thrown by the source", async () => {
    async function* source(): AsyncGenerator<TransferTask<number>> {
      yield* trackedTasks(1).tasks;
      throw new Error("listing failed");
    }

    await expect(
      doWithProgress(source(), { length: 2, concurrency: 1 }),
    ).rejects.toThrow("listing failed");
  });

  it("passes each task its position in the source", async () => {
    const seen: number[] = [];
    const tasks = ["a", "b", "a"].map(
      (label): TransferTask<string> => ({
        label,
        async run(id) {
          seen.push(id);
          await tick();
          return `${label}#${id}`;
        },
      }),
    );

    const report = await collectThenDoWithProgress(tasks, { concurrency: 2 });

    expect(seen).toEqual([0, 1, 2]);
    expect([...report.results].sort()).toEqual(["a#0", "a#2", "b#1"]);
  });

  it("completes an empty batch", async () => {
    const report = await doWithProgress([], { length: 0, concurrency: 4 });

    expect(report).toEqual({ completed: 0, results: [], failures: [] });
  });
});
