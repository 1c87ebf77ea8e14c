import { NotFoundError } from "../errors/catalog.js";
import type { HttpClient } from "../http/client.js";
import {
  PluginInstanceSchema,
  type PluginInstanceResponse,
} from "../schemas/cube.js";
import type { SearchBuilder } from "../search/builder.js";
import type { Access, ReadWrite } from "./access.js";
import { Feed } from "./feed.js";
import { FileModel } from "./file.js";
import { LazyLinkedModel, LinkedModel } from "./linked.js";
import { Plugin } from "./plugin.js";
import { pluginInstanceParameterLinker } from "./resources.js";
import type { Linker } from "./types.js";

export class PluginInstance<A extends Access> extends LinkedModel<
  "pluginInstance",
  A
> {
  static readonly linker: Linker<"pluginInstance"> = {
    kind: "pluginInstance",
    schema: PluginInstanceSchema,
    link<A extends Access>(
      http: HttpClient,
      object: PluginInstanceResponse,
      access: A,
    ) {
      return new PluginInstance(http, object, access);
    },
  };

  constructor(http: HttpClient, object: PluginInstanceResponse, access: A) {
    super(http, PluginInstance.linker, object, access);
  }

  feed(): LazyLinkedModel<"feed", A> {
    return this.getLazy(Feed.linker, this.object.feed);
  }

  plugin(): LazyLinkedModel<"plugin", A> {
    return this.getLazy(Plugin.linker, this.object.plugin);
  }

  /** The instance this one ran after; `null` for the root of a feed. */
  previous(): LazyLinkedModel<"pluginInstance", A> | null {
    const { previous } = this.object;
    return previous === null ? null : this.getLazy(PluginInstance.linker, previous);
  }

  /** This instance and every instance downstream of it. */
  descendants(): SearchBuilder<"pluginInstance", A> {
    return this.getCollection(PluginInstance.linker, this.object.descendants);
  }

  parameters(): SearchBuilder<"pluginInstanceParameter", A> {
    return this.getCollection(
      pluginInstanceParameterLinker,
      this.object.parameters,
    );
  }

  /** Output files. */
  files(): SearchBuilder<"file", A> {
    const { files } = this.object;
    if (files === undefined) {
      throw new NotFoundError(`files of plugin instance ${this.object.id}`);
    }
    return this.getCollection(FileModel.linker, files);
  }

  async setTitle(
    this: PluginInstance<ReadWrite>,
    title: string,
  ): Promise<PluginInstance<ReadWrite>> {
    return this.put({ title });
  }

  /** Ask CUBE to stop this instance. */
  async cancel(this: PluginInstance<ReadWrite>): Promise<PluginInstance<ReadWrite>> {
    return this.put({ status: "cancelled" });
  }
}
