/**
 * In-process stand-in for CUBE, for tests.
 *
 * A Hono app reached through `app.request`, so no socket is opened. It
 * serves the API root, paginated collections with `search/` filtering,
 * detail URLs of every registered item, file contents, and multipart
 * uploads. Tests can register extra routes, inject error responses and
 * drop connections.
 */

import { Hono } from "hono";
import type { Context } from "hono";
import type { FetchFn } from "../http/client.js";

export const CUBE_URL = "http://cube.test/api/v1/";

export type Item = Record<string, unknown>;

type Handler = (request: Request) => Response | Promise<Response>;

interface Failure {
  status: number;
  body: string;
  remaining: number;
}

const DEFAULT_LIMIT = 10;

export interface FakeCube {
  readonly app: Hono;
  readonly url: string;
  readonly fetch: FetchFn;
  /** `METHOD url` of every request that reached the app. */
  readonly requests: string[];
  /** Authorization header of every request, in order. */
  readonly authorizations: Array<string | undefined>;
  /** Contents of uploaded and registered files, by `fname`. */
  readonly contents: Map<string, string>;

  /** Serve `items` at `${url}${name}/`, registering each item's own URL. */
  addCollection(name: string, items: Item[]): void;
  /**
   * Add a file resource to collection `name` (default `files`). Returns
   * the registered item.
   */
  addFile(fname: string, content: string, name?: string): Item;
  /** Answer `method path` with `handler`, ahead of the built-in routes. */
  route(method: string, path: string, handler: Handler): void;
  /** Answer the next `times` requests to `path` with `status`. */
  failNext(path: string, status: number, times?: number, body?: string): void;
  /** Make the next `times` requests throw before reaching the app. */
  dropNext(times?: number): void;
}

export function createFakeCube(): FakeCube {
  const base = new URL(CUBE_URL);
  const collections = new Map<string, Item[]>();
  const objects = new Map<string, Item>();
  const downloads = new Map<string, string>();
  const routes = new Map<string, Handler>();
  const failures = new Map<string, Failure>();
  const requests: string[] = [];
  const authorizations: Array<string | undefined> = [];
  const contents = new Map<string, string>();
  let drops = 0;
  let nextFileId = 1;

  const app = new Hono();

  app.use("*", async (c, next) => {
    requests.push(`${c.req.method} ${c.req.url}`);
    authorizations.push(c.req.header("Authorization"));
    const failure = failures.get(c.req.path);
    if (failure !== undefined && failure.remaining > 0) {
      failure.remaining--;
      return new Response(failure.body, { status: failure.status });
    }
    const custom = routes.get(`${c.req.method} ${c.req.path}`);
    if (custom !== undefined) {
      return custom(c.req.raw);
    }
    await next();
  });

  app.get("*", (c) => {
    const path = c.req.path;
    if (path === base.pathname) {
      return c.json({ ...paginate(c, []), collection_links: collectionLinks() });
    }

    const collection = collections.get(path);
    if (collection !== undefined) {
      return c.json(paginate(c, collection));
    }

    if (path.endsWith("/search/")) {
      const parent = collections.get(path.slice(0, -"search/".length));
      if (parent !== undefined) {
        const filtered = parent.filter((item) => matches(item, c.req.query()));
        return c.json(paginate(c, filtered));
      }
    }

    const object = objects.get(path);
    if (object !== undefined) return c.json(object);

    const content = downloads.get(path);
    if (content !== undefined) {
      return new Response(content, {
        headers: { "Content-Type": "application/octet-stream" },
      });
    }

    return c.json({ detail: "Not found." }, 404);
  });

  app.post("*", async (c) => {
    const path = c.req.path;
    if (path === `${base.pathname}auth-token/`) {
      return c.json({ token: "test-token" });
    }
    const collection = collections.get(path);
    if (collection === undefined) {
      return c.json({ detail: "Method not allowed." }, 405);
    }
    const form = await c.req.parseBody();
    const file = form["fname"];
    const uploadPath = form["upload_path"];
    if (
      file === undefined ||
      typeof file === "string" ||
      typeof uploadPath !== "string"
    ) {
      return c.json({ fname: ["This field is required."] }, 400);
    }
    const text = await file.text();
    const name = path.slice(base.pathname.length, -1);
    const item = registerFile(uploadPath, text, name, file.size);
    return c.json(item, 201);
  });

  app.all("*", (c) => c.json({ detail: "Method not allowed." }, 405));

  function paginate(c: Context, items: Item[]) {
    const url = new URL(c.req.url);
    const limit = intParam(url, "limit", DEFAULT_LIMIT);
    const offset = intParam(url, "offset", 0);
    const results = limit === 0 ? [] : items.slice(offset, offset + limit);
    const hasNext = limit > 0 && offset + limit < items.length;
    return {
      count: items.length,
      next: hasNext ? pageUrl(url, limit, offset + limit) : null,
      previous:
        offset > 0 && limit > 0
          ? pageUrl(url, limit, Math.max(0, offset - limit))
          : null,
      results,
    };
  }

  function collectionLinks(): Record<string, string> {
    return {
      public_feeds: `${CUBE_URL}publicfeeds/`,
      plugins: `${CUBE_URL}plugins/`,
      plugin_instances: `${CUBE_URL}plugins/instances/`,
      pipelines: `${CUBE_URL}pipelines/`,
      workflows: `${CUBE_URL}pipelines/workflows/`,
      files: `${CUBE_URL}files/`,
      userfiles: `${CUBE_URL}userfiles/`,
    };
  }

  function registerFile(
    fname: string,
    content: string,
    name: string,
    size = Buffer.byteLength(content),
  ): Item {
    const id = nextFileId++;
    const basename = fname.slice(fname.lastIndexOf("/") + 1);
    const url = `${CUBE_URL}${name}/${id}/`;
    const fileResource = `${url}${basename}`;
    const item: Item = {
      url,
      id,
      fname,
      fsize: size,
      file_resource: fileResource,
      creation_date: "2024-01-01T00:00:00.000000-05:00",
      owner_username: "chris",
    };
    const collectionPath = `${base.pathname}${name}/`;
    const collection = collections.get(collectionPath) ?? [];
    collection.push(item);
    collections.set(collectionPath, collection);
    objects.set(new URL(url).pathname, item);
    downloads.set(new URL(fileResource).pathname, content);
    contents.set(fname, content);
    return item;
  }

  const fetch: FetchFn = async (input, init) => {
    if (drops > 0) {
      drops--;
      throw new TypeError("fetch failed");
    }
    return app.request(input, init);
  };

  return {
    app,
    url: CUBE_URL,
    fetch,
    requests,
    authorizations,
    contents,
    addCollection(name, items) {
      collections.set(`${base.pathname}${name}/`, items);
      for (const item of items) {
        if (typeof item.url === "string") {
          objects.set(new URL(item.url).pathname, item);
        }
      }
    },
    addFile(fname, content, name = "files") {
      return registerFile(fname, content, name);
    },
    route(method, path, handler) {
      routes.set(`${method} ${path}`, handler);
    },
    failNext(path, status, times = 1, body = "") {
      failures.set(path, { status, body, remaining: times });
    },
    dropNext(times = 1) {
      drops += times;
    },
  };
}

function intParam(url: URL, key: string, fallback: number): number {
  const raw = url.searchParams.get(key);
  if (raw === null) return fallback;
  const value = Number.parseInt(raw, 10);
  return Number.isNaN(value) ? fallback : value;
}

function pageUrl(url: URL, limit: number, offset: number): string {
  const page = new URL(url);
  page.searchParams.set("limit", String(limit));
  page.searchParams.set("offset", String(offset));
  return page.toString();
}

/**
 * Approximates CUBE's filter semantics: `_exact`, `_startswith` and
 * `_icontains` suffixes, prefix match on `fname`, substring match on
 * `name`, equality otherwise. Unknown keys are ignored.
 */
function matches(item: Item, query: Record<string, string>): boolean {
  for (const [key, expected] of Object.entries(query)) {
    if (key === "limit" || key === "offset") continue;
    const [field, op] = splitKey(key);
    if (!(field in item)) continue;
    const actual = String(item[field]);
    const ok =
      op === "exact"
        ? actual === expected
        : op === "startswith"
          ? actual.startsWith(expected)
          : op === "icontains"
            ? actual.toLowerCase().includes(expected.toLowerCase())
            : field === "fname"
              ? actual.startsWith(expected)
              : field === "name"
                ? actual.includes(expected)
                : actual === expected;
    if (!ok) return false;
  }
  return true;
}

function splitKey(key: string): [string, string | null] {
  for (const op of ["exact", "startswith", "icontains"]) {
    const suffix = `_${op}`;
    if (key.endsWith(suffix)) return [key.slice(0, -suffix.length), op];
  }
  return [key, null];
}
