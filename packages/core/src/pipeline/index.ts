export {
  canonicalize,
  expandPipeline,
  ExpandedTreeParameterSchema,
  ExpandedTreePipelineSchema,
  ExpandedTreePipingSchema,
  PossiblyExpandedPipelineSchema,
  type CanonPipeline,
  type ExpandedTreeParameter,
  type ExpandedTreePipeline,
  type ExpandedTreePiping,
  type PossiblyExpandedPipeline,
} from "./canon.js";
export {
  expandTitleIndexed,
  parsePluginString,
  TitleIndexedPipelineSchema,
  TitleIndexedPipingSchema,
  type TitleIndexedPipeline,
  type TitleIndexedPiping,
} from "./title-indexed.js";
export {
  parsePipeline,
  pipelineFormatOf,
  readPipelineFile,
  type PipelineFormat,
} from "./document.js";
