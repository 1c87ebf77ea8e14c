import { mkdir } from "node:fs/promises";
import { dirname, join } from "node:path";
import type { Logger } from "pino";
import { FileIOError } from "../errors/catalog.js";
import type { Access } from "../models/access.js";
import type { FileModel } from "../models/file.js";
import type { Search } from "../search/search.js";
import type { Channel } from "./channel.js";
import {
  doWithProgress,
  type ExecutionReport,
  type FailPolicy,
  type TransferTask,
} from "./executor.js";
import type { TransferEvent } from "./progress.js";

export interface DownloadAllOptions {
  concurrency: number;
  /** Number of files in the search, when the caller already counted them. */
  length?: number;
  /**
   * Leading part of every `fname` to leave out of the local path, e.g. the
   * folder being downloaded.
   */
  prefix?: string;
  /** How many leading `…/data/` segments to drop from each path. Default: 0 */
  shorten?: number;
  /** Overwrite existing local files. Default: false */
  clobber?: boolean;
  /** Default: abort on the first failure. */
  failPolicy?: FailPolicy;
  /** Receives start, chunk and done events of every file. Not closed. */
  events?: Channel<TransferEvent>;
  onProgress?: (completed: number, length: number) => void;
  logger?: Logger;
}

/**
 * Drop everything up to and including the first `/data/`, `times` times.
 * Paths without `/data/` are returned unchanged.
 */
export function shortenFname(fname: string, times: number): string {
  let result = fname;
  for (let i = 0; i < times; i++) {
    const at = result.indexOf("/data/");
    if (at === -1) break;
    result = result.slice(at + "/data/".length);
  }
  return result;
}

/** Local path for `fname` under `dst`. */
export function targetPath(
  fname: string,
  dst: string,
  options: Pick<DownloadAllOptions, "prefix" | "shorten"> = {},
): string {
  const prefix = (options.prefix ?? "").replace(/\/+$/, "");
  const relative =
    prefix !== "" && fname.startsWith(`${prefix}/`)
      ? fname.slice(prefix.length + 1)
      : fname;
  return join(dst, shortenFname(relative, options.shorten ?? 0));
}

/**
 * Download every file of `search` under `dst`. The number of files is
 * counted first, unless given; a collection that changes size during the download fails
 * with an executor length error.
 */
export async function downloadAll<A extends Access>(
  search: Search<"file", A>,
  dst: string,
  options: DownloadAllOptions,
): Promise<ExecutionReport<string>> {
  const { events, logger } = options;
  const length = options.length ?? (await search.count());
  if (length === 0) {
    logger?.info({ dst }, "Nothing to download");
    return { completed: 0, results: [], failures: [] };
  }

  const task = (file: FileModel<A>): TransferTask<string> => ({
    label: file.fname,
    async run(id) {
      const target = targetPath(file.fname, dst, options);
      await mkdir(dirname(target), { recursive: true }).catch((err: unknown) => {
        throw new FileIOError(target, `Cannot create directory for ${target}`, {
          cause: err,
        });
      });
      events?.send({ type: "start", id, name: file.fname, size: file.fsize });
      try {
        await file.download(target, {
          clobber: options.clobber,
          onChunk: (delta) => events?.send({ type: "chunk", id, delta }),
        });
      } finally {
        events?.send({ type: "done", id });
      }
      logger?.debug({ fname: file.fname, target }, "Downloaded file");
      return target;
    },
  });

  async function* tasks() {
    for await (const file of search.streamConnected()) {
      yield task(file);
    }
  }

  return doWithProgress(tasks(), {
    length,
    concurrency: options.concurrency,
    failPolicy: options.failPolicy,
    onProgress: options.onProgress,
    logger,
  });
}
