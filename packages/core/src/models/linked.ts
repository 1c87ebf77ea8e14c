/**
 * CUBE resources paired with the client that fetched them.
 *
 * A {@link LinkedModel} can get, create, modify or delete the resources its
 * object links to, including itself. Its access tag is inherited by
 * everything reached through it.
 */

import type { HttpClient } from "../http/client.js";
import { SearchBuilder } from "../search/builder.js";
import { assertWritable, type Access, type ReadOnly, type ReadWrite } from "./access.js";
import type { Kind, Linker, ModelFor, ResponseFor } from "./types.js";

export class LinkedModel<K extends Kind, A extends Access> {
  constructor(
    protected readonly http: HttpClient,
    protected readonly linker: Linker<K>,
    readonly object: ResponseFor[K],
    readonly access: A,
  ) {}

  get url(): string {
    return this.object.url;
  }

  intoReadOnly(): ModelFor<ReadOnly>[K] {
    return this.linker.link(this.http, this.object, "ro");
  }

  /** Fetch this resource again. */
  async refresh(): Promise<ModelFor<A>[K]> {
    const object = await this.http.getJson(this.url, this.linker.schema);
    return this.linker.link(this.http, object, this.access);
  }

  /** Delete this resource. */
  async delete(this: LinkedModel<K, ReadWrite>): Promise<void> {
    assertWritable(this.access);
    await this.http.delete(this.url);
  }

  protected getCollection<C extends Kind>(
    linker: Linker<C>,
    url: string,
  ): SearchBuilder<C, A> {
    return SearchBuilder.collection({ http: this.http, linker }, url, this.access);
  }

  protected getLazy<C extends Kind>(
    linker: Linker<C>,
    url: string,
  ): LazyLinkedModel<C, A> {
    return new LazyLinkedModel(this.http, linker, url, this.access);
  }

  /** Update this resource with `body`, returning its new state. */
  protected async put(
    this: LinkedModel<K, ReadWrite>,
    body: Record<string, unknown>,
  ): Promise<ModelFor<ReadWrite>[K]> {
    assertWritable(this.access);
    const object = await this.http.sendJson(
      "PUT",
      this.url,
      body,
      this.linker.schema,
    );
    return this.linker.link(this.http, object, "rw");
  }

  /** Create a resource of kind `C` in the collection at `url`. */
  protected async post<C extends Kind>(
    this: LinkedModel<K, ReadWrite>,
    linker: Linker<C>,
    url: string,
    body: Record<string, unknown>,
  ): Promise<ModelFor<ReadWrite>[C]> {
    assertWritable(this.access);
    const object = await this.http.sendJson("POST", url, body, linker.schema);
    return linker.link(this.http, object, "rw");
  }
}

/**
 * A resource known only by its URL. {@link LazyLinkedModel.get} fetches it.
 */
export class LazyLinkedModel<K extends Kind, A extends Access> {
  constructor(
    private readonly http: HttpClient,
    private readonly linker: Linker<K>,
    readonly url: string,
    readonly access: A,
  ) {}

  async get(): Promise<ModelFor<A>[K]> {
    const object = await this.http.getJson(this.url, this.linker.schema);
    return this.linker.link(this.http, object, this.access);
  }
}
