import type { Logger } from "pino";
import { InvalidCubeUrlError, NotFoundError } from "../errors/catalog.js";
import { HttpClient, type FetchFn } from "../http/client.js";
import { retryTransient, type RetryOptions } from "../http/retry.js";
import type { Access } from "../models/access.js";
import { Feed } from "../models/feed.js";
import { FileModel } from "../models/file.js";
import { Pipeline } from "../models/pipeline.js";
import { Plugin } from "../models/plugin.js";
import { PluginInstance } from "../models/plugin-instance.js";
import { workflowLinker } from "../models/resources.js";
import {
  BaseResponseSchema,
  type CubeLinks,
} from "../schemas/cube.js";
import {
  FeedSearchBuilder,
  FileSearchBuilder,
  newQuery,
  PipelineSearchBuilder,
  PluginInstanceSearchBuilder,
  PluginSearchBuilder,
  WorkflowSearchBuilder,
} from "../search/builder.js";
import { LIMIT_ZERO } from "../search/query.js";

export interface ClientOptions {
  /** Defaults to the global `fetch`. */
  fetch?: FetchFn;
  /** Retries of transient failures per request. Default: 3 */
  retries?: number;
  /** Time each attempt may wait for response headers. Default: no limit */
  timeoutMs?: number;
  /** Backoff tuning for the retry middleware. */
  backoff?: Omit<RetryOptions, "maxRetries" | "logger">;
  /** Page size of every search made through the client. */
  pageLimit?: number;
  logger?: Logger;
}

const DEFAULT_RETRIES = 3;

/** Check that `url` looks like `http(s)://…/api/v1/`. */
export function parseCubeUrl(url: string): string {
  if (!url.startsWith("http://") && !url.startsWith("https://")) {
    throw new InvalidCubeUrlError(url, "CUBE URL must start with http:// or https://");
  }
  if (!url.endsWith("/api/v1/")) {
    throw new InvalidCubeUrlError(url, "CUBE URL must end with /api/v1/");
  }
  return url;
}

/** HTTP client with `headers` and the retry middleware configured. */
export function createHttp(
  options: ClientOptions,
  headers: Record<string, string> = {},
): HttpClient {
  return new HttpClient({
    fetch: options.fetch,
    headers,
    timeoutMs: options.timeoutMs,
  }).with(
    retryTransient({
      ...options.backoff,
      maxRetries: options.retries ?? DEFAULT_RETRIES,
      logger: options.logger,
    }),
  );
}

/** Read the collection links from the API root. */
export async function fetchLinks(
  http: HttpClient,
  url: string,
): Promise<CubeLinks> {
  const res = await http.getJson(url, BaseResponseSchema, LIMIT_ZERO);
  return res.collection_links;
}

/** Operations common to anonymous and authenticated clients. */
export abstract class BaseClient<A extends Access> {
  protected constructor(
    protected readonly http: HttpClient,
    readonly url: string,
    readonly links: CubeLinks,
    readonly access: A,
    protected readonly options: ClientOptions,
  ) {}

  protected get logger(): Logger | undefined {
    return this.options.logger;
  }

  protected configure<B extends { pageLimit(limit: number): B }>(
    builder: B,
  ): B {
    const { pageLimit } = this.options;
    return pageLimit === undefined ? builder : builder.pageLimit(pageLimit);
  }

  plugins(): PluginSearchBuilder<A> {
    return this.configure(
      new PluginSearchBuilder(
        { http: this.http, linker: Plugin.linker, logger: this.logger },
        newQuery(this.links.plugins, "search"),
        this.access,
      ),
    );
  }

  pipelines(): PipelineSearchBuilder<A> {
    return this.configure(
      new PipelineSearchBuilder(
        { http: this.http, linker: Pipeline.linker, logger: this.logger },
        newQuery(this.links.pipelines, "search"),
        this.access,
      ),
    );
  }

  pluginInstances(): PluginInstanceSearchBuilder<A> {
    return this.configure(
      new PluginInstanceSearchBuilder(
        { http: this.http, linker: PluginInstance.linker, logger: this.logger },
        newQuery(this.links.plugin_instances, "search"),
        this.access,
      ),
    );
  }

  workflows(): WorkflowSearchBuilder<A> {
    const url = this.links.workflows;
    if (url === undefined) throw new NotFoundError("workflows");
    return this.configure(
      new WorkflowSearchBuilder(
        { http: this.http, linker: workflowLinker, logger: this.logger },
        newQuery(url, "search"),
        this.access,
      ),
    );
  }

  /** Feeds visible to everyone. Always read-only. */
  publicFeeds(): FeedSearchBuilder<"ro"> {
    return this.configure(
      new FeedSearchBuilder(
        { http: this.http, linker: Feed.linker, logger: this.logger },
        newQuery(this.links.public_feeds, "search"),
        "ro",
      ),
    );
  }

  /**
   * Search a file collection, e.g. `files/`, `userfiles/` or `pacsfiles/`.
   * Defaults to the `files` collection link.
   */
  files(url: string | undefined = this.links.files): FileSearchBuilder<A> {
    if (url === undefined) throw new NotFoundError("files");
    return this.configure(
      new FileSearchBuilder(
        { http: this.http, linker: FileModel.linker, logger: this.logger },
        newQuery(url, "search"),
        this.access,
      ),
    );
  }

  /** Feed by id. The API root is the feed collection. */
  async getFeed(id: number): Promise<Feed<A>> {
    const object = await this.http.getJson(
      `${this.url}${id}/`,
      Feed.linker.schema,
    );
    return new Feed(this.http, object, this.access);
  }

  async getPluginInstance(id: number): Promise<PluginInstance<A>> {
    const object = await this.http.getJson(
      `${this.links.plugin_instances}${id}/`,
      PluginInstance.linker.schema,
    );
    return new PluginInstance(this.http, object, this.access);
  }

  /**
   * Plugin by exact name. With `version`, exactly that version; without,
   * whichever CUBE lists first.
   */
  async getPlugin(name: string, version?: string): Promise<Plugin<A>> {
    let builder = this.plugins().nameExact(name);
    if (version !== undefined) builder = builder.version(version);
    const plugin = await builder.search().first();
    if (plugin === null) {
      throw new NotFoundError(
        version === undefined ? name : `${name}@${version}`,
      );
    }
    return plugin;
  }
}
