import { describe, it, expect, vi } from "vitest";
import { z } from "zod";
import { RemoteError, RequestError } from "../errors/catalog.js";
import { HttpClient, withQuery, type FetchFn, type Middleware } from "./client.js";

const BASE = "http://cube.test/api/v1/";

describe("withQuery", () => {
  it("returns the URL untouched without parameters", () => {
    expect(withQuery(`${BASE}plugins/`)).toBe(`${BASE}plugins/`);
  });

  it("replaces existing keys", () => {
    expect(
      withQuery(`${BASE}plugins/?limit=10&offset=20`, [["offset", 0]]),
    ).toBe(`${BASE}plugins/?limit=10&offset=0`);
  });
});

describe("HttpClient", () => {
  it("sends default headers merged with per-client headers", async () => {
    const fetch = vi.fn<FetchFn>(async () => Response.json({}));
    const http = new HttpClient({ fetch }).withHeaders({
      Authorization: "Token test-token",
    });

    await http.get(BASE);

    const [, init] = fetch.mock.calls[0] ?? [];
    expect(init?.headers).toEqual({
      Accept: "application/json",
      Authorization: "Token test-token",
    });
  });

  it("runs middleware with the first registered innermost", async () => {
    const order: string[] = [];
    const tag =
      (name: string): Middleware =>
      async (request, next) => {
        order.push(`${name}:in`);
        const res = await next(request);
        order.push(`${name}:out`);
        return res;
      };
    const http = new HttpClient({ fetch: async () => Response.json({}) })
      .with(tag("inner"))
      .with(tag("outer"));

    await http.get(BASE);

    expect(order).toEqual(["outer:in", "inner:in", "inner:out", "outer:out"]);
  });

  it("turns non-2xx responses into RemoteError with the body", async () => {
    const http = new HttpClient({
      fetch: async () =>
        new Response('{"detail":"Authentication credentials were not provided."}', {
          status: 401,
          statusText: "Unauthorized",
        }),
    });

    const err = await http.get(`${BASE}feeds/`).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(RemoteError);
    expect(err).toMatchObject({
      status: 401,
      reason: "Unauthorized",
      url: `${BASE}feeds/`,
      message:
        '(401 Unauthorized): {"detail":"Authentication credentials were not provided."}',
    });
  });

  it("falls back to the standard reason phrase", async () => {
    const http = new HttpClient({
      fetch: async () => new Response("", { status: 404 }),
    });

    await expect(http.get(BASE)).rejects.toThrow("(404 Not Found)");
  });

  it("wraps connection failures in RequestError", async () => {
    const http = new HttpClient({
      fetch: async () => {
        throw new TypeError("fetch failed");
      },
    });

    const err = await http.get(BASE).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(RequestError);
    expect(err).toMatchObject({
      kind: "network",
      message: `Failed HTTP request to ${BASE}: fetch failed`,
    });
  });

  it("fails to decode a body of the wrong shape", async () => {
    const http = new HttpClient({
      fetch: async () => Response.json({ count: "many" }),
    });

    const err = await http
      .getJson(BASE, z.object({ count: z.number() }))
      .catch((e: unknown) => e);

    expect(err).toBeInstanceOf(RequestError);
    expect(err).toMatchObject({ kind: "decode", code: "DECODE_FAILED" });
  });

  it("fails to decode a body that is not JSON", async () => {
    const http = new HttpClient({
      fetch: async () => new Response("<html></html>"),
    });

    await expect(http.getJson(BASE, z.object({}))).rejects.toThrow(
      `Invalid JSON from ${BASE}`,
    );
  });

  it("sends JSON bodies", async () => {
    const fetch = vi.fn<FetchFn>(async () => Response.json({ id: 7 }));
    const http = new HttpClient({ fetch });

    const res = await http.sendJson(
      "PUT",
      `${BASE}7/`,
      { name: "renamed" },
      z.object({ id: z.number() }),
    );

    expect(res).toEqual({ id: 7 });
    const [url, init] = fetch.mock.calls[0] ?? [];
    expect(url).toBe(`${BASE}7/`);
    expect(init?.method).toBe("PUT");
    expect(init?.body).toBe('{"name":"renamed"}');
    expect(init?.headers).toEqual({
      Accept: "application/json",
      "Content-Type": "application/json",
    });
  });

  it("aborts an attempt that gets no response in time", async () => {
    const stalled: FetchFn = (_url, init) =>
      new Promise((_resolve, reject) => {
        init?.signal?.addEventListener("abort", () =>
          reject(init.signal?.reason),
        );
      });
    const http = new HttpClient({ fetch: stalled, timeoutMs: 10 });

    const err = await http.get(BASE).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(RequestError);
    expect(err).toMatchObject({ kind: "network", url: BASE });
    expect(err).toHaveProperty(
      "message",
      `Failed HTTP request to ${BASE}: no response within 10 ms`,
    );
  });

  it("stops the timer once the response arrives", async () => {
    let signal: AbortSignal | null | undefined;
    const http = new HttpClient({
      fetch: async (_url, init) => {
        signal = init?.signal;
        return Response.json({});
      },
      timeoutMs: 10,
    });

    await http.get(BASE);
    await new Promise((resolve) => setTimeout(resolve, 30));

    expect(signal?.aborted).toBe(false);
  });

  it("keeps the caller's signal alongside the timeout", async () => {
    const stalled: FetchFn = (_url, init) =>
      new Promise((_resolve, reject) => {
        init?.signal?.addEventListener("abort", () =>
          reject(init.signal?.reason),
        );
      });
    const http = new HttpClient({ fetch: stalled, timeoutMs: 60_000 });
    const controller = new AbortController();

    const pending = http.send(BASE, { signal: controller.signal });
    controller.abort(new Error("cancelled"));

    await expect(pending).rejects.toThrow(
      `Failed HTTP request to ${BASE}: cancelled`,
    );
  });
});
