import { posix } from "node:path";
import type { Logger } from "pino";
import type { ChrisClient } from "../client/authed.js";
import { FileIOError } from "../errors/catalog.js";
import type { Channel } from "./channel.js";
import { discoverInputFiles, type InputFile } from "./discover.js";
import {
  doWithProgress,
  type ExecutionReport,
  type FailPolicy,
  type TransferTask,
} from "./executor.js";
import type { TransferEvent } from "./progress.js";

export interface UploadOptions {
  concurrency: number;
  /** Default: record local I/O errors, abort on anything else. */
  failPolicy?: FailPolicy;
  /** Receives start, chunk and done events of every file. Not closed. */
  events?: Channel<TransferEvent>;
  onProgress?: (completed: number, length: number) => void;
  logger?: Logger;
}

export interface UploadResult {
  path: string;
  fname: string;
  fsize: number;
}

/** Keep going past unreadable local files; anything else stops the batch. */
export const recordFileErrors: FailPolicy = (error) =>
  error instanceof FileIOError ? "record" : "abort";

/** Upload path of `file` under `dest`, `/`-separated. */
export function uploadPathOf(file: InputFile, dest: string): string {
  return dest === "" ? file.relative : posix.join(dest, file.relative);
}

/**
 * Upload every file under `paths` to `<username>/uploads/<dest>/`, keeping
 * the directory structure.
 */
export async function uploadAll(
  client: ChrisClient,
  paths: readonly string[],
  dest: string,
  options: UploadOptions,
): Promise<ExecutionReport<UploadResult>> {
  const files = await discoverInputFiles(paths);
  return uploadFiles(client, files, dest, options);
}

export async function uploadFiles(
  client: ChrisClient,
  files: readonly InputFile[],
  dest: string,
  options: UploadOptions,
): Promise<ExecutionReport<UploadResult>> {
  const { events, logger } = options;

  const tasks = files.map(
    (file): TransferTask<UploadResult> => ({
      label: file.path,
      async run(id) {
        const uploadPath = uploadPathOf(file, dest);
        events?.send({ type: "start", id, name: uploadPath, size: file.size });
        try {
          const uploaded = await client.uploadFile(
            file.path,
            uploadPath,
            (delta) => events?.send({ type: "chunk", id, delta }),
          );
          logger?.info(
            { path: file.path, fname: uploaded.fname },
            "Uploaded file",
          );
          return { path: file.path, fname: uploaded.fname, fsize: uploaded.fsize };
        } finally {
          events?.send({ type: "done", id });
        }
      },
    }),
  );

  return doWithProgress(tasks, {
    length: files.length,
    concurrency: options.concurrency,
    failPolicy: options.failPolicy ?? recordFileErrors,
    onProgress: options.onProgress,
    logger,
  });
}
