export {
  assertWritable,
  type Access,
  type ReadOnly,
  type ReadWrite,
} from "./access.js";
export type {
  Filters,
  Kind,
  Linker,
  ModelFor,
  ResponseFor,
} from "./types.js";
export { LazyLinkedModel, LinkedModel } from "./linked.js";
export { Plugin, type CreateInstanceBody } from "./plugin.js";
export { PluginInstance } from "./plugin-instance.js";
export { Feed } from "./feed.js";
export { Pipeline } from "./pipeline.js";
export {
  basename,
  FileModel,
  type DownloadOptions,
  type FileStream,
} from "./file.js";
export {
  noteLinker,
  pipelineDefaultParameterLinker,
  pipingLinker,
  pluginInstanceParameterLinker,
  pluginParameterLinker,
  workflowLinker,
} from "./resources.js";
