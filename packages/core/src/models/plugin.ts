import type { HttpClient } from "../http/client.js";
import { PluginSchema, type PluginResponse } from "../schemas/cube.js";
import type { SearchBuilder } from "../search/builder.js";
import { assertWritable, type Access, type ReadWrite } from "./access.js";
import { LinkedModel } from "./linked.js";
import { PluginInstance } from "./plugin-instance.js";
import { pluginParameterLinker } from "./resources.js";
import type { Linker } from "./types.js";

/** Body of a plugin instance creation request. */
export type CreateInstanceBody = {
  previous_id?: number;
  title?: string;
  compute_resource_name?: string;
} & Record<string, unknown>;

/**
 * A ChRIS plugin. Call {@link Plugin.createInstance} to run it; a
 * read-only plugin can only be inspected.
 */
export class Plugin<A extends Access> extends LinkedModel<"plugin", A> {
  static readonly linker: Linker<"plugin"> = {
    kind: "plugin",
    schema: PluginSchema,
    link<A extends Access>(http: HttpClient, object: PluginResponse, access: A) {
      return new Plugin(http, object, access);
    },
  };

  constructor(http: HttpClient, object: PluginResponse, access: A) {
    super(http, Plugin.linker, object, access);
  }

  /** `name@version`, e.g. `pl-dircopy@2.1.1`. */
  get nameAndVersion(): string {
    return `${this.object.name}@${this.object.version}`;
  }

  getParameters(): SearchBuilder<"pluginParameter", A> {
    return this.getCollection(pluginParameterLinker, this.object.parameters);
  }

  instances(): SearchBuilder<"pluginInstance", A> {
    return this.getCollection(PluginInstance.linker, this.object.instances);
  }

  /** Create a plugin instance, i.e. run this plugin. */
  async createInstance(
    this: Plugin<ReadWrite>,
    body: CreateInstanceBody,
  ): Promise<PluginInstance<ReadWrite>> {
    assertWritable(this.access);
    return this.post(PluginInstance.linker, this.object.instances, body);
  }
}
