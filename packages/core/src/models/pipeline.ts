import type { HttpClient } from "../http/client.js";
import { PipelineSchema, type PipelineResponse } from "../schemas/cube.js";
import type { SearchBuilder } from "../search/builder.js";
import type { Access, ReadWrite } from "./access.js";
import { LinkedModel } from "./linked.js";
import { Plugin } from "./plugin.js";
import {
  pipelineDefaultParameterLinker,
  pipingLinker,
  workflowLinker,
} from "./resources.js";
import type { Linker, ModelFor } from "./types.js";

export class Pipeline<A extends Access> extends LinkedModel<"pipeline", A> {
  static readonly linker: Linker<"pipeline"> = {
    kind: "pipeline",
    schema: PipelineSchema,
    link<A extends Access>(
      http: HttpClient,
      object: PipelineResponse,
      access: A,
    ) {
      return new Pipeline(http, object, access);
    },
  };

  constructor(http: HttpClient, object: PipelineResponse, access: A) {
    super(http, Pipeline.linker, object, access);
  }

  plugins(): SearchBuilder<"plugin", A> {
    return this.getCollection(Plugin.linker, this.object.plugins);
  }

  pipings(): SearchBuilder<"piping", A> {
    return this.getCollection(pipingLinker, this.object.plugin_pipings);
  }

  defaultParameters(): SearchBuilder<"pipelineDefaultParameter", A> {
    return this.getCollection(
      pipelineDefaultParameterLinker,
      this.object.default_parameters,
    );
  }

  workflows(): SearchBuilder<"workflow", A> {
    return this.getCollection(workflowLinker, this.object.workflows);
  }

  /**
   * Run this pipeline after the plugin instance `previousId`, creating a
   * workflow.
   */
  async createWorkflow(
    this: Pipeline<ReadWrite>,
    previousId: number,
    title?: string,
  ): Promise<ModelFor<ReadWrite>["workflow"]> {
    return this.post(workflowLinker, this.object.workflows, {
      previous_plugin_inst_id: previousId,
      ...(title !== undefined && { title }),
    });
  }
}
