/**
 * Bounded-concurrency runner for transfer tasks.
 *
 * Tasks are pulled lazily from the source, at most `concurrency` at a
 * time. Every outcome, success or failure, goes through a {@link Channel}
 * so that only the executor loop updates counters. The caller declares how
 * many tasks the source will produce; a source that disagrees is an error.
 */

import type { Logger } from "pino";
import { OverfullError, UnderfullError } from "../errors/catalog.js";
import { Channel } from "./channel.js";

export interface TransferTask<T> {
  /** Names the task in failure reports and logs, e.g. a path. */
  label: string;
  /**
   * Start the transfer. `id` is the task's position in the source, unique
   * within one run; progress events of the task carry it.
   */
  run(id: number): Promise<T>;
}

/** What to do with a failed task: count it and go on, or stop everything. */
export type FailDecision = "record" | "abort";

export type FailPolicy = (error: unknown) => FailDecision;

export interface ExecutorOptions {
  /** Number of tasks the source is expected to produce. */
  length: number;
  concurrency: number;
  /** Default: abort on any failure. */
  failPolicy?: FailPolicy;
  /** Called after every completion, with the number of completions so far. */
  onProgress?: (completed: number, length: number) => void;
  logger?: Logger;
}

export interface TaskFailure {
  id: number;
  label: string;
  error: unknown;
}

export interface ExecutionReport<T> {
  /** Completions, successful or recorded as failed. */
  completed: number;
  /** Values of successful tasks, in completion order. */
  results: T[];
  failures: TaskFailure[];
}

type Outcome<T> =
  | { ok: true; id: number; label: string; value: T }
  | { ok: false; id: number; label: string; error: unknown };

export const abortOnFailure: FailPolicy = () => "abort";

/**
 * Run `tasks` with at most `options.concurrency` in flight.
 *
 * Rejects with the first failure the policy aborts on, with an error thrown
 * by the source itself, with {@link OverfullError} as soon as the source
 * produces more than `length` tasks, or with {@link UnderfullError} when
 * it ends early. Tasks already running when the executor gives up run to
 * completion unobserved.
 */
export async function doWithProgress<T>(
  tasks: AsyncIterable<TransferTask<T>> | Iterable<TransferTask<T>>,
  options: ExecutorOptions,
): Promise<ExecutionReport<T>> {
  const { length, logger, onProgress } = options;
  const concurrency = Math.max(1, options.concurrency);
  const failPolicy = options.failPolicy ?? abortOnFailure;
  const source = iterate(tasks);
  const outcomes = new Channel<Outcome<T>>();

  let dispatched = 0;
  let inFlight = 0;
  let exhausted = false;
  const report: ExecutionReport<T> = { completed: 0, results: [], failures: [] };

  const dispatch = async (): Promise<void> => {
    const next = await source.next();
    if (next.done) {
      exhausted = true;
      return;
    }
    const id = dispatched++;
    if (dispatched > length) throw new OverfullError(length);
    inFlight++;
    void settle(next.value, id, outcomes);
  };

  const fill = async (): Promise<void> => {
    while (!exhausted && inFlight < concurrency) {
      await dispatch();
    }
  };

  try {
    await fill();
    while (inFlight > 0) {
      const received = await outcomes.receive();
      if (received.done) break;
      const outcome = received.value;
      inFlight--;
      report.completed++;

      if (outcome.ok) {
        report.results.push(outcome.value);
      } else if (failPolicy(outcome.error) === "record") {
        const { id, label, error } = outcome;
        logger?.error({ id, label, err: error }, "Transfer task failed");
        report.failures.push({ id, label, error });
      } else {
        throw outcome.error;
      }

      onProgress?.(report.completed, length);
      await fill();
    }
  } finally {
    outcomes.close();
  }

  if (report.completed < length) {
    throw new UnderfullError(length, report.completed);
  }
  return report;
}

/** {@link doWithProgress} over a finite list, whose length is known. */
export async function collectThenDoWithProgress<T>(
  tasks: readonly TransferTask<T>[],
  options: Omit<ExecutorOptions, "length">,
): Promise<ExecutionReport<T>> {
  return doWithProgress(tasks, { ...options, length: tasks.length });
}

async function settle<T>(
  task: TransferTask<T>,
  id: number,
  outcomes: Channel<Outcome<T>>,
): Promise<void> {
  const { label } = task;
  try {
    outcomes.send({ ok: true, id, label, value: await task.run(id) });
  } catch (error) {
    outcomes.send({ ok: false, id, label, error });
  }
}

function iterate<T>(
  tasks: AsyncIterable<T> | Iterable<T>,
): AsyncIterator<T> | Iterator<T> {
  return Symbol.asyncIterator in tasks
    ? tasks[Symbol.asyncIterator]()
    : tasks[Symbol.iterator]();
}
