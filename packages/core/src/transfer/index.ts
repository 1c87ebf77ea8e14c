export { Channel } from "./channel.js";
export {
  abortOnFailure,
  collectThenDoWithProgress,
  doWithProgress,
  type ExecutionReport,
  type ExecutorOptions,
  type FailDecision,
  type FailPolicy,
  type TaskFailure,
  type TransferTask,
} from "./executor.js";
export {
  MultiFileTransferProgress,
  type ProgressRenderer,
  type TransferEvent,
} from "./progress.js";
export { discoverInputFiles, type InputFile } from "./discover.js";
export {
  recordFileErrors,
  uploadAll,
  uploadFiles,
  uploadPathOf,
  type UploadOptions,
  type UploadResult,
} from "./upload.js";
export {
  downloadAll,
  shortenFname,
  targetPath,
  type DownloadAllOptions,
} from "./download.js";
