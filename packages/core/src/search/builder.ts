import type { Logger } from "pino";
import type { HttpClient } from "../http/client.js";
import type { Access, ReadOnly } from "../models/access.js";
import type { Filters, Kind, Linker } from "../models/types.js";
import type { PluginInstanceStatus, PluginResponse } from "../schemas/cube.js";
import type { CollectionQuery, QueryValue, SearchMode } from "./query.js";
import { ActiveSearch } from "./search.js";

/** What a builder needs to produce a live search. */
export interface SearchSource<K extends Kind> {
  http: HttpClient;
  linker: Linker<K>;
  logger?: Logger;
}

export function newQuery(baseUrl: string, mode: SearchMode): CollectionQuery {
  return { baseUrl, mode, filters: new Map() };
}

/**
 * Immutable request builder for a collection or search endpoint. Every
 * setter returns a new builder of the same concrete type.
 */
export abstract class QueryBuilder<
  K extends Kind,
  A extends Access,
  Self extends QueryBuilder<K, A, Self>,
> {
  constructor(
    protected readonly source: SearchSource<K>,
    readonly query: CollectionQuery,
    readonly access: A,
  ) {}

  protected abstract derive(query: CollectionQuery): Self;

  /**
   * Number of items per page. Only worth changing for performance.
   *
   * See also {@link maxItems}.
   */
  pageLimit(limit: number): Self {
    return this.derive({ ...this.query, pageLimit: limit });
  }

  /** Caps the number of items to produce. */
  maxItems(maxItems: number): Self {
    return this.derive({ ...this.query, maxItems });
  }

  /** Set a search parameter, replacing any previous value for `key`. */
  where<F extends keyof Filters[K] & string>(
    key: F,
    value: Filters[K][F] & QueryValue,
  ): Self {
    const filters = new Map(this.query.filters);
    filters.set(key, value);
    return this.derive({ ...this.query, filters });
  }

  search(): ActiveSearch<K, A> {
    const { http, linker, logger } = this.source;
    return new ActiveSearch(http, linker, this.query, this.access, logger);
  }
}

/** Builder without named filters, for plain collections. */
export class SearchBuilder<K extends Kind, A extends Access> extends QueryBuilder<
  K,
  A,
  SearchBuilder<K, A>
> {
  static collection<K extends Kind, A extends Access>(
    source: SearchSource<K>,
    url: string,
    access: A,
  ): SearchBuilder<K, A> {
    return new SearchBuilder(source, newQuery(url, "plain"), access);
  }

  protected derive(query: CollectionQuery): SearchBuilder<K, A> {
    return new SearchBuilder(this.source, query, this.access);
  }

  intoReadOnly(): SearchBuilder<K, ReadOnly> {
    return new SearchBuilder(this.source, this.query, "ro");
  }
}

export class PluginSearchBuilder<A extends Access> extends QueryBuilder<
  "plugin",
  A,
  PluginSearchBuilder<A>
> {
  protected derive(query: CollectionQuery): PluginSearchBuilder<A> {
    return new PluginSearchBuilder(this.source, query, this.access);
  }

  intoReadOnly(): PluginSearchBuilder<ReadOnly> {
    return new PluginSearchBuilder(this.source, this.query, "ro");
  }

  id(id: number) {
    return this.where("id", id);
  }

  /** Substring match on the plugin's name. */
  name(name: string) {
    return this.where("name", name);
  }

  nameExact(name: string) {
    return this.where("name_exact", name);
  }

  version(version: string) {
    return this.where("version", version);
  }

  type(type: PluginResponse["type"]) {
    return this.where("type", type);
  }

  title(title: string) {
    return this.where("title", title);
  }

  category(category: string) {
    return this.where("category", category);
  }

  description(description: string) {
    return this.where("description", description);
  }

  /** Matches any of name, title or category. */
  nameTitleCategory(value: string) {
    return this.where("name_title_category", value);
  }

  minCreationDate(date: string) {
    return this.where("min_creation_date", date);
  }

  maxCreationDate(date: string) {
    return this.where("max_creation_date", date);
  }
}

export class FeedSearchBuilder<A extends Access> extends QueryBuilder<
  "feed",
  A,
  FeedSearchBuilder<A>
> {
  protected derive(query: CollectionQuery): FeedSearchBuilder<A> {
    return new FeedSearchBuilder(this.source, query, this.access);
  }

  intoReadOnly(): FeedSearchBuilder<ReadOnly> {
    return new FeedSearchBuilder(this.source, this.query, "ro");
  }

  id(id: number) {
    return this.where("id", id);
  }

  name(name: string) {
    return this.where("name", name);
  }

  nameExact(name: string) {
    return this.where("name_exact", name);
  }

  nameStartswith(prefix: string) {
    return this.where("name_startswith", prefix);
  }

  minId(id: number) {
    return this.where("min_id", id);
  }

  maxId(id: number) {
    return this.where("max_id", id);
  }
}

export class PipelineSearchBuilder<A extends Access> extends QueryBuilder<
  "pipeline",
  A,
  PipelineSearchBuilder<A>
> {
  protected derive(query: CollectionQuery): PipelineSearchBuilder<A> {
    return new PipelineSearchBuilder(this.source, query, this.access);
  }

  intoReadOnly(): PipelineSearchBuilder<ReadOnly> {
    return new PipelineSearchBuilder(this.source, this.query, "ro");
  }

  id(id: number) {
    return this.where("id", id);
  }

  name(name: string) {
    return this.where("name", name);
  }

  category(category: string) {
    return this.where("category", category);
  }

  ownerUsername(username: string) {
    return this.where("owner_username", username);
  }

  description(description: string) {
    return this.where("description", description);
  }
}

export class PluginInstanceSearchBuilder<A extends Access> extends QueryBuilder<
  "pluginInstance",
  A,
  PluginInstanceSearchBuilder<A>
> {
  protected derive(query: CollectionQuery): PluginInstanceSearchBuilder<A> {
    return new PluginInstanceSearchBuilder(this.source, query, this.access);
  }

  intoReadOnly(): PluginInstanceSearchBuilder<ReadOnly> {
    return new PluginInstanceSearchBuilder(this.source, this.query, "ro");
  }

  id(id: number) {
    return this.where("id", id);
  }

  title(title: string) {
    return this.where("title", title);
  }

  status(status: PluginInstanceStatus) {
    return this.where("status", status);
  }

  pluginName(name: string) {
    return this.where("plugin_name", name);
  }

  pluginVersion(version: string) {
    return this.where("plugin_version", version);
  }

  feedId(id: number) {
    return this.where("feed_id", id);
  }

  previousId(id: number) {
    return this.where("previous_id", id);
  }

  ownerUsername(username: string) {
    return this.where("owner_username", username);
  }
}

export class WorkflowSearchBuilder<A extends Access> extends QueryBuilder<
  "workflow",
  A,
  WorkflowSearchBuilder<A>
> {
  protected derive(query: CollectionQuery): WorkflowSearchBuilder<A> {
    return new WorkflowSearchBuilder(this.source, query, this.access);
  }

  intoReadOnly(): WorkflowSearchBuilder<ReadOnly> {
    return new WorkflowSearchBuilder(this.source, this.query, "ro");
  }

  id(id: number) {
    return this.where("id", id);
  }

  title(title: string) {
    return this.where("title", title);
  }

  pipelineName(name: string) {
    return this.where("pipeline_name", name);
  }

  ownerUsername(username: string) {
    return this.where("owner_username", username);
  }
}

export class FileSearchBuilder<A extends Access> extends QueryBuilder<
  "file",
  A,
  FileSearchBuilder<A>
> {
  protected derive(query: CollectionQuery): FileSearchBuilder<A> {
    return new FileSearchBuilder(this.source, query, this.access);
  }

  intoReadOnly(): FileSearchBuilder<ReadOnly> {
    return new FileSearchBuilder(this.source, this.query, "ro");
  }

  id(id: number) {
    return this.where("id", id);
  }

  /** Exact path prefix match. */
  fname(fname: string) {
    return this.where("fname", fname);
  }

  fnameExact(fname: string) {
    return this.where("fname_exact", fname);
  }

  fnameIcontains(fragment: string) {
    return this.where("fname_icontains", fragment);
  }

  /** Number of slashes in `fname`, i.e. directory depth. */
  fnameNslashes(count: number | string) {
    return this.where("fname_nslashes", String(count));
  }
}
