import { NotFoundError } from "../errors/catalog.js";
import type { HttpClient } from "../http/client.js";
import { FeedSchema, type FeedResponse } from "../schemas/cube.js";
import type { SearchBuilder } from "../search/builder.js";
import type { Access, ReadWrite } from "./access.js";
import { FileModel } from "./file.js";
import { LazyLinkedModel, LinkedModel } from "./linked.js";
import { PluginInstance } from "./plugin-instance.js";
import { noteLinker } from "./resources.js";
import type { Linker } from "./types.js";

export class Feed<A extends Access> extends LinkedModel<"feed", A> {
  static readonly linker: Linker<"feed"> = {
    kind: "feed",
    schema: FeedSchema,
    link<A extends Access>(http: HttpClient, object: FeedResponse, access: A) {
      return new Feed(http, object, access);
    },
  };

  constructor(http: HttpClient, object: FeedResponse, access: A) {
    super(http, Feed.linker, object, access);
  }

  note(): LazyLinkedModel<"note", A> {
    return this.getLazy(noteLinker, this.object.note);
  }

  getPluginInstances(): SearchBuilder<"pluginInstance", A> {
    return this.getCollection(
      PluginInstance.linker,
      this.object.plugin_instances,
    );
  }

  files(): SearchBuilder<"file", A> {
    const { files } = this.object;
    if (files === undefined) {
      throw new NotFoundError(`files of feed ${this.object.id}`);
    }
    return this.getCollection(FileModel.linker, files);
  }

  async setName(this: Feed<ReadWrite>, name: string): Promise<Feed<ReadWrite>> {
    return this.put({ name });
  }
}
