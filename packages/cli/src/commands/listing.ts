import type { BaseClient, Client } from "@chris-ts/core/client";
import type { Access, Kind, ResponseFor } from "@chris-ts/core/models";
import type { FeedSearchBuilder, Search } from "@chris-ts/core/search";

export const RESOURCES = [
  "plugins",
  "feeds",
  "files",
  "pipelines",
  "instances",
] as const;

export type Resource = (typeof RESOURCES)[number];

export function isResource(value: string): value is Resource {
  return RESOURCES.some((resource) => resource === value);
}

export interface ListingOptions {
  /**
   * Narrows the listing: a name fragment for plugins, feeds and pipelines,
   * a path prefix for files, a plugin name for instances.
   */
  filter?: string;
  limit?: number;
}

/** A resource collection under one filter, as a count and as text lines. */
export interface Listing {
  count(): Promise<number>;
  lines(): AsyncGenerator<string, void, undefined>;
}

/**
 * Listing of `resource`. Feeds are the user's own when logged in, public
 * feeds otherwise.
 */
export function listingOf(
  client: Client,
  resource: Resource,
  options: ListingOptions = {},
): Listing {
  return client.access === "rw"
    ? listingFor(client, client.feeds(), resource, options)
    : listingFor(client, client.publicFeeds(), resource, options);
}

function listingFor<A extends Access, F extends Access>(
  client: BaseClient<A>,
  feeds: FeedSearchBuilder<F>,
  resource: Resource,
  { filter, limit }: ListingOptions,
): Listing {
  const bounded = <B extends { maxItems(maxItems: number): B }>(builder: B): B =>
    limit === undefined ? builder : builder.maxItems(limit);

  switch (resource) {
    case "plugins": {
      const builder = client.plugins();
      return listing<"plugin", A>(
        bounded(filter === undefined ? builder : builder.name(filter)).search(),
        (plugin) => `${plugin.name} ${plugin.version}`,
      );
    }
    case "feeds":
      return listing<"feed", F>(
        bounded(filter === undefined ? feeds : feeds.name(filter)).search(),
        (feed) => `${feed.id} ${feed.name}`,
      );
    case "files": {
      const builder = client.files();
      return listing<"file", A>(
        bounded(filter === undefined ? builder : builder.fname(filter)).search(),
        (file) => file.fname,
      );
    }
    case "pipelines": {
      const builder = client.pipelines();
      return listing<"pipeline", A>(
        bounded(filter === undefined ? builder : builder.name(filter)).search(),
        (pipeline) => `${pipeline.id} ${pipeline.name}`,
      );
    }
    case "instances": {
      const builder = client.pluginInstances();
      return listing<"pluginInstance", A>(
        bounded(
          filter === undefined ? builder : builder.pluginName(filter),
        ).search(),
        (instance) =>
          `${instance.id} ${instance.plugin_name}@${instance.plugin_version} ${instance.status}`,
      );
    }
  }
}

function listing<K extends Kind, A extends Access>(
  search: Search<K, A>,
  format: (object: ResponseFor[K]) => string,
): Listing {
  return {
    count: () => search.count(),
    async *lines() {
      for await (const object of search.stream()) {
        yield format(object);
      }
    },
  };
}
