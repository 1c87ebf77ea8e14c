/**
 * Lazy, cursor-driven traversal of CUBE collection endpoints.
 *
 * A {@link Search} is either an {@link ActiveSearch}, bound to a
 * {@link CollectionQuery} and a client, or an {@link EmptySearch}, a
 * request-free placeholder for queries known to be unservable. Both are
 * immutable.
 *
 * After the first page, traversal follows the server's `next` URL exactly.
 * Filters do not survive a rebuild from offsets, so the cursor is the only
 * state carried between pages.
 */

import type { Logger } from "pino";
import type { HttpClient } from "../http/client.js";
import {
  EmptyCollectionError,
  TooManyResultsError,
} from "../errors/catalog.js";
import { decode } from "../http/check.js";
import { CountSchema, PageSchema, type Paginated } from "../schemas/cube.js";
import type { Access, ReadOnly } from "../models/access.js";
import type { Kind, Linker, ModelFor, ResponseFor } from "../models/types.js";
import { initialUrl, LIMIT_ONE, LIMIT_ZERO, type CollectionQuery } from "./query.js";

export interface Search<K extends Kind, A extends Access> {
  readonly access: A;

  /** Total number of items, as declared by the server. */
  count(): Promise<number>;

  /** First item, or `null` for an empty collection. */
  first(): Promise<ModelFor<A>[K] | null>;

  /**
   * The only item. Use when something guarantees at most one match, e.g.
   * searching plugins by both name and version, or anything by id.
   */
  only(): Promise<ModelFor<A>[K]>;

  /**
   * Single-pass, lazy sequence of items in server order. Every call starts
   * a fresh traversal from the original query.
   */
  stream(): AsyncGenerator<ResponseFor[K], void, undefined>;

  /** Like {@link stream}, with each item linked to this search's client. */
  streamConnected(): AsyncGenerator<ModelFor<A>[K], void, undefined>;

  intoReadOnly(): Search<K, ReadOnly>;
}

export class ActiveSearch<K extends Kind, A extends Access>
  implements Search<K, A>
{
  constructor(
    private readonly http: HttpClient,
    private readonly linker: Linker<K>,
    readonly query: CollectionQuery,
    readonly access: A,
    private readonly logger?: Logger,
  ) {}

  async count(): Promise<number> {
    const { count } = await this.http.getJson(
      initialUrl(this.query, LIMIT_ZERO),
      CountSchema,
    );
    return count;
  }

  async first(): Promise<ModelFor<A>[K] | null> {
    const page = await this.fetchPage(initialUrl(this.query, LIMIT_ONE));
    const [object] = page.results;
    return object === undefined ? null : this.link(object);
  }

  async only(): Promise<ModelFor<A>[K]> {
    const page = await this.fetchPage(initialUrl(this.query, LIMIT_ONE));
    if (page.count > 1) {
      throw new TooManyResultsError(page.count, { url: this.query.baseUrl });
    }
    const [object] = page.results;
    if (object === undefined) {
      throw new EmptyCollectionError({ url: this.query.baseUrl });
    }
    return this.link(object);
  }

  async *stream(): AsyncGenerator<ResponseFor[K], void, undefined> {
    const maxItems = this.query.maxItems ?? Number.POSITIVE_INFINITY;
    let yielded = 0;
    let url: string | null = initialUrl(this.query);

    while (url !== null) {
      if (yielded >= maxItems) return;
      const page = await this.fetchPage(url);
      for (const item of page.results) {
        if (yielded >= maxItems) return;
        yield item;
        yielded++;
      }
      url = page.next;
    }
  }

  async *streamConnected(): AsyncGenerator<ModelFor<A>[K], void, undefined> {
    for await (const object of this.stream()) {
      yield this.link(object);
    }
  }

  intoReadOnly(): ActiveSearch<K, ReadOnly> {
    return new ActiveSearch(
      this.http,
      this.linker,
      this.query,
      "ro",
      this.logger,
    );
  }

  private async fetchPage(url: string): Promise<Paginated<ResponseFor[K]>> {
    this.logger?.debug({ url }, "Fetching collection page");
    const page = await this.http.getJson(url, PageSchema);
    return {
      ...page,
      results: page.results.map((item) =>
        decode(this.linker.schema, item, url),
      ),
    };
  }

  private link(object: ResponseFor[K]): ModelFor<A>[K] {
    return this.linker.link(this.http, object, this.access);
  }
}

/** A search which cannot contain items. Makes no requests. */
export class EmptySearch<K extends Kind, A extends Access>
  implements Search<K, A>
{
  constructor(readonly access: A) {}

  async count(): Promise<number> {
    return 0;
  }

  async first(): Promise<ModelFor<A>[K] | null> {
    return null;
  }

  async only(): Promise<ModelFor<A>[K]> {
    throw new EmptyCollectionError();
  }

  async *stream(): AsyncGenerator<ResponseFor[K], void, undefined> {}

  async *streamConnected(): AsyncGenerator<ModelFor<A>[K], void, undefined> {}

  intoReadOnly(): EmptySearch<K, ReadOnly> {
    return new EmptySearch("ro");
  }
}
