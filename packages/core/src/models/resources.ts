import type { HttpClient } from "../http/client.js";
import {
  NoteSchema,
  PipelineDefaultParameterSchema,
  PipingSchema,
  PluginInstanceParameterSchema,
  PluginParameterSchema,
  WorkflowSchema,
  type NoteResponse,
  type PipelineDefaultParameter,
  type PipingResponse,
  type PluginInstanceParameter,
  type PluginParameter,
  type WorkflowResponse,
} from "../schemas/cube.js";
import type { Access } from "./access.js";
import { LinkedModel } from "./linked.js";
import type { Linker } from "./types.js";

// Kinds without operations of their own.

export const pluginParameterLinker: Linker<"pluginParameter"> = {
  kind: "pluginParameter",
  schema: PluginParameterSchema,
  link<A extends Access>(http: HttpClient, object: PluginParameter, access: A) {
    return new LinkedModel(http, pluginParameterLinker, object, access);
  },
};

export const pluginInstanceParameterLinker: Linker<"pluginInstanceParameter"> = {
  kind: "pluginInstanceParameter",
  schema: PluginInstanceParameterSchema,
  link<A extends Access>(
    http: HttpClient,
    object: PluginInstanceParameter,
    access: A,
  ) {
    return new LinkedModel(http, pluginInstanceParameterLinker, object, access);
  },
};

export const noteLinker: Linker<"note"> = {
  kind: "note",
  schema: NoteSchema,
  link<A extends Access>(http: HttpClient, object: NoteResponse, access: A) {
    return new LinkedModel(http, noteLinker, object, access);
  },
};

export const pipingLinker: Linker<"piping"> = {
  kind: "piping",
  schema: PipingSchema,
  link<A extends Access>(http: HttpClient, object: PipingResponse, access: A) {
    return new LinkedModel(http, pipingLinker, object, access);
  },
};

export const pipelineDefaultParameterLinker: Linker<"pipelineDefaultParameter"> =
  {
    kind: "pipelineDefaultParameter",
    schema: PipelineDefaultParameterSchema,
    link<A extends Access>(
      http: HttpClient,
      object: PipelineDefaultParameter,
      access: A,
    ) {
      return new LinkedModel(
        http,
        pipelineDefaultParameterLinker,
        object,
        access,
      );
    },
  };

export const workflowLinker: Linker<"workflow"> = {
  kind: "workflow",
  schema: WorkflowSchema,
  link<A extends Access>(http: HttpClient, object: WorkflowResponse, access: A) {
    return new LinkedModel(http, workflowLinker, object, access);
  },
};
