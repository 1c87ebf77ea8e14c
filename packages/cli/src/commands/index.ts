export { withProgress, type CommandContext } from "./context.js";
export {
  isResource,
  listingOf,
  RESOURCES,
  type Listing,
  type ListingOptions,
  type Resource,
} from "./listing.js";
export { countCommand, type CountArgs } from "./count.js";
export { lsCommand, type LsArgs } from "./ls.js";
export { downloadCommand, type DownloadArgs } from "./download.js";
export { uploadCommand, type UploadArgs } from "./upload.js";
export { parsePluginRef, runCommand, type RunArgs } from "./run.js";
export { pipelineAddCommand, type PipelineAddArgs } from "./pipeline-add.js";
