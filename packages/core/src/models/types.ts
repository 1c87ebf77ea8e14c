import type { z } from "zod";
import type { HttpClient } from "../http/client.js";
import type {
  DownloadableFile,
  FeedResponse,
  NoteResponse,
  PipelineDefaultParameter,
  PipelineResponse,
  PipingResponse,
  PluginInstanceParameter,
  PluginInstanceResponse,
  PluginInstanceStatus,
  PluginParameter,
  PluginResponse,
  WorkflowResponse,
} from "../schemas/cube.js";
import type { Access } from "./access.js";
import type { LinkedModel } from "./linked.js";
import type { Plugin } from "./plugin.js";
import type { PluginInstance } from "./plugin-instance.js";
import type { Feed } from "./feed.js";
import type { Pipeline } from "./pipeline.js";
import type { FileModel } from "./file.js";

/** Deserialized response type of each kind of CUBE resource. */
export interface ResponseFor {
  plugin: PluginResponse;
  pluginParameter: PluginParameter;
  pluginInstance: PluginInstanceResponse;
  pluginInstanceParameter: PluginInstanceParameter;
  feed: FeedResponse;
  note: NoteResponse;
  pipeline: PipelineResponse;
  piping: PipingResponse;
  pipelineDefaultParameter: PipelineDefaultParameter;
  workflow: WorkflowResponse;
  file: DownloadableFile;
}

export type Kind = keyof ResponseFor;

/** Linked model class of each kind, for a given access capability. */
export interface ModelFor<A extends Access> {
  plugin: Plugin<A>;
  pluginParameter: LinkedModel<"pluginParameter", A>;
  pluginInstance: PluginInstance<A>;
  pluginInstanceParameter: LinkedModel<"pluginInstanceParameter", A>;
  feed: Feed<A>;
  note: LinkedModel<"note", A>;
  pipeline: Pipeline<A>;
  piping: LinkedModel<"piping", A>;
  pipelineDefaultParameter: LinkedModel<"pipelineDefaultParameter", A>;
  workflow: LinkedModel<"workflow", A>;
  file: FileModel<A>;
}

/**
 * How to decode a resource of kind `K`, and how to pair the decoded value
 * with a client handle.
 */
export interface Linker<K extends Kind> {
  readonly kind: K;
  readonly schema: z.ZodType<ResponseFor[K]>;
  link<A extends Access>(
    http: HttpClient,
    object: ResponseFor[K],
    access: A,
  ): ModelFor<A>[K];
}

/**
 * Query parameters accepted by each kind's `search/` endpoint. Kinds that
 * are only listed (never searched) accept none.
 */
export interface Filters {
  plugin: {
    id: number;
    name: string;
    name_exact: string;
    version: string;
    type: PluginResponse["type"];
    title: string;
    category: string;
    description: string;
    name_title_category: string;
    min_creation_date: string;
    max_creation_date: string;
  };
  pluginParameter: Record<never, never>;
  pluginInstance: {
    id: number;
    title: string;
    status: PluginInstanceStatus;
    plugin_name: string;
    plugin_version: string;
    feed_id: number;
    previous_id: number;
    owner_username: string;
  };
  pluginInstanceParameter: Record<never, never>;
  feed: {
    id: number;
    name: string;
    name_exact: string;
    name_startswith: string;
    min_id: number;
    max_id: number;
  };
  note: Record<never, never>;
  pipeline: {
    id: number;
    name: string;
    category: string;
    owner_username: string;
    description: string;
  };
  piping: Record<never, never>;
  pipelineDefaultParameter: Record<never, never>;
  workflow: {
    id: number;
    title: string;
    pipeline_name: string;
    owner_username: string;
  };
  file: {
    id: number;
    fname: string;
    fname_exact: string;
    fname_icontains: string;
    fname_nslashes: string;
  };
}
