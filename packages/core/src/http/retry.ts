/**
 * Retry policy middleware.
 *
 * - No response (connection error, timeout): transient
 * - 5xx: transient
 * - 4xx: fatal, returned as-is for the caller's status check
 * - anything else: not our business
 *
 * Transient outcomes are retried with exponential backoff:
 * delay = min(baseDelayMs * 2^attempt, maxDelayMs) + jitter(0..maxJitterMs).
 * Once `maxRetries` is exhausted the last outcome propagates unchanged: the
 * thrown error, or the last 5xx response.
 */

import type { Logger } from "pino";
import type { Middleware } from "./client.js";

export type Retryable = "transient" | "fatal";

export type Outcome =
  | { kind: "response"; response: Response }
  | { kind: "error"; error: unknown };

export function classify(outcome: Outcome): Retryable | null {
  if (outcome.kind === "error") return "transient";
  const { status } = outcome.response;
  if (status >= 500 && status <= 599) return "transient";
  if (status >= 400 && status <= 499) return "fatal";
  return null;
}

export interface RetryOptions {
  /** Max number of retries after the first attempt. */
  maxRetries: number;
  /** Default: 500 */
  baseDelayMs?: number;
  /** Default: 30000 */
  maxDelayMs?: number;
  /** Default: 250 */
  maxJitterMs?: number;
  logger?: Logger;
}

export function backoffDelay(
  attempt: number,
  options: Pick<RetryOptions, "baseDelayMs" | "maxDelayMs" | "maxJitterMs">,
  random: () => number = Math.random,
): number {
  const base = options.baseDelayMs ?? 500;
  const max = options.maxDelayMs ?? 30_000;
  const jitter = options.maxJitterMs ?? 250;
  return Math.min(base * 2 ** attempt, max) + Math.floor(random() * jitter);
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function retryTransient(options: RetryOptions): Middleware {
  const { maxRetries, logger } = options;

  return async (request, next) => {
    for (let attempt = 0; ; attempt++) {
      let outcome: Outcome;
      try {
        outcome = { kind: "response", response: await next(request) };
      } catch (error) {
        outcome = { kind: "error", error };
      }

      const retryable = classify(outcome);
      if (retryable !== "transient" || attempt >= maxRetries) {
        if (retryable === "transient") {
          logger?.warn(
            { url: request.url, attempts: attempt + 1 },
            "Giving up on request after retries",
          );
        }
        if (outcome.kind === "error") throw outcome.error;
        return outcome.response;
      }

      if (outcome.kind === "response") {
        // release the connection before trying again
        await outcome.response.body?.cancel();
      }
      const delayMs = backoffDelay(attempt, options);
      logger?.debug(
        {
          url: request.url,
          attempt: attempt + 1,
          delayMs,
          ...(outcome.kind === "response"
            ? { status: outcome.response.status }
            : {}),
        },
        "Retrying transient failure",
      );
      await sleep(delayMs);
    }
  };
}
