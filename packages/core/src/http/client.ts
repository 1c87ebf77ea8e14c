/**
 * Minimal HTTP client for CUBE.
 *
 * Wraps `fetch` with default headers (Accept, Authorization) computed once
 * per client, and a chain of request interceptors (middleware). Instances
 * are immutable; `with`/`withHeaders` return a new client, so one instance
 * can be shared by any number of concurrent tasks.
 *
 * With `timeoutMs`, every attempt that gets no response headers in time is
 * aborted and fails like a dropped connection. The body is not timed.
 */

import type { z } from "zod";
import { RequestError } from "../errors/catalog.js";
import { check, readJson } from "./check.js";

export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

export interface HttpRequest {
  url: string;
  init: RequestInit;
}

export type Next = (request: HttpRequest) => Promise<Response>;

/** A request interceptor. Must call `next` zero or more times and return a response. */
export type Middleware = (request: HttpRequest, next: Next) => Promise<Response>;

export type SendInit = Omit<RequestInit, "headers"> & {
  headers?: Record<string, string>;
};

export type QueryParams = Iterable<readonly [string, string | number]>;

export interface HttpClientOptions {
  /** Defaults to the global `fetch`. */
  fetch?: FetchFn;
  headers?: Record<string, string>;
  middleware?: readonly Middleware[];
  /** Time allowed for each attempt to receive response headers. */
  timeoutMs?: number;
}

/** Returns `url` with the given query parameters set (existing keys are replaced). */
export function withQuery(url: string, query?: QueryParams): string {
  if (query === undefined) return url;
  const u = new URL(url);
  for (const [key, value] of query) {
    u.searchParams.set(key, String(value));
  }
  return u.toString();
}

interface Deadline {
  signal: AbortSignal | null | undefined;
  expired: boolean;
  clear(): void;
}

export class HttpClient {
  private readonly fetchFn: FetchFn;
  private readonly headers: Readonly<Record<string, string>>;
  private readonly middleware: readonly Middleware[];
  private readonly timeoutMs: number | undefined;

  constructor(options: HttpClientOptions = {}) {
    this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init));
    this.headers = { Accept: "application/json", ...options.headers };
    this.middleware = options.middleware ?? [];
    this.timeoutMs = options.timeoutMs;
  }

  /** New client with `middleware` appended (outermost last). */
  with(middleware: Middleware): HttpClient {
    return new HttpClient({
      ...this.options(),
      middleware: [...this.middleware, middleware],
    });
  }

  withHeaders(headers: Record<string, string>): HttpClient {
    return new HttpClient({
      ...this.options(),
      headers: { ...this.headers, ...headers },
    });
  }

  private options(): HttpClientOptions {
    return {
      fetch: this.fetchFn,
      headers: this.headers,
      middleware: this.middleware,
      timeoutMs: this.timeoutMs,
    };
  }

  /**
   * Send a request through the middleware chain. Rejects with
   * {@link RequestError} when no response is obtained; does not check
   * the status.
   */
  async send(url: string, init: SendInit = {}): Promise<Response> {
    const request: HttpRequest = {
      url,
      init: { ...init, headers: { ...this.headers, ...init.headers } },
    };

    const terminal: Next = async ({ url, init }) => {
      const deadline = this.deadline(init.signal);
      try {
        return await this.fetchFn(url, { ...init, signal: deadline.signal });
      } catch (err) {
        const reason = deadline.expired
          ? `no response within ${this.timeoutMs} ms`
          : err instanceof Error
            ? err.message
            : String(err);
        throw new RequestError(
          "network",
          url,
          `Failed HTTP request to ${url}: ${reason}`,
          { cause: err },
        );
      } finally {
        deadline.clear();
      }
    };

    // The first middleware in the list is the innermost.
    const chain = this.middleware.reduce<Next>(
      (next, mw) => (req) => mw(req, next),
      terminal,
    );
    return chain(request);
  }

  /**
   * Signal for one attempt: the caller's, combined with a timer that fires
   * after `timeoutMs` unless cleared once the response arrives.
   */
  private deadline(signal: AbortSignal | null | undefined): Deadline {
    const { timeoutMs } = this;
    if (timeoutMs === undefined) {
      return { signal, expired: false, clear: () => {} };
    }
    const controller = new AbortController();
    const deadline: Deadline = {
      signal:
        signal == null
          ? controller.signal
          : AbortSignal.any([signal, controller.signal]),
      expired: false,
      clear: () => clearTimeout(timer),
    };
    const timer = setTimeout(() => {
      deadline.expired = true;
      controller.abort(new Error(`Timed out after ${timeoutMs} ms`));
    }, timeoutMs);
    return deadline;
  }

  async get(url: string, query?: QueryParams): Promise<Response> {
    const full = withQuery(url, query);
    return check(await this.send(full), full);
  }

  async getJson<T>(
    url: string,
    schema: z.ZodType<T>,
    query?: QueryParams,
  ): Promise<T> {
    const full = withQuery(url, query);
    return readJson(await check(await this.send(full), full), schema, full);
  }

  async sendJson<T>(
    method: "POST" | "PUT",
    url: string,
    body: unknown,
    schema: z.ZodType<T>,
  ): Promise<T> {
    const res = await this.send(url, {
      method,
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(body),
    });
    return readJson(await check(res, url), schema, url);
  }

  async postForm<T>(
    url: string,
    form: FormData,
    schema: z.ZodType<T>,
  ): Promise<T> {
    const res = await this.send(url, { method: "POST", body: form });
    return readJson(await check(res, url), schema, url);
  }

  async delete(url: string): Promise<void> {
    const res = await check(await this.send(url, { method: "DELETE" }), url);
    await res.body?.cancel();
  }
}
