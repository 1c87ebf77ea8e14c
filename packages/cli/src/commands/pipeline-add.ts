import { NotLoggedInError } from "@chris-ts/core/errors";
import type { Pipeline, ReadWrite } from "@chris-ts/core/models";
import { canonicalize, readPipelineFile } from "@chris-ts/core/pipeline";
import type { CommandContext } from "./context.js";

export interface PipelineAddArgs {
  /** A `.json`, `.yml` or `.yaml` pipeline file. */
  file: string;
}

/** Upload a pipeline file and print the new pipeline's URL. */
export async function pipelineAddCommand(
  ctx: CommandContext,
  args: PipelineAddArgs,
): Promise<Pipeline<ReadWrite>> {
  const { client } = ctx;
  if (client.access !== "rw") throw new NotLoggedInError("pipeline-add");

  const pipeline = await readPipelineFile(args.file);
  const uploaded = await client.uploadPipeline(canonicalize(pipeline));
  ctx.logger.info(
    { name: pipeline.name, pipings: pipeline.plugin_tree.length },
    "Added pipeline",
  );
  ctx.print(uploaded.object.url);
  return uploaded;
}
