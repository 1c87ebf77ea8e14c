import { open, type FileHandle } from "node:fs/promises";
import { FileIOError, RequestError } from "../errors/catalog.js";
import type { HttpClient } from "../http/client.js";
import {
  DownloadableFileSchema,
  type DownloadableFile,
} from "../schemas/cube.js";
import type { Access } from "./access.js";
import { LinkedModel } from "./linked.js";
import type { Linker } from "./types.js";

export interface FileStream {
  body: ReadableStream<Uint8Array> | null;
  /** Size declared by CUBE. */
  size: number;
}

export interface DownloadOptions {
  /** Overwrite an existing file at the destination. Default: false */
  clobber?: boolean;
  /** Called with the byte count of every chunk written. */
  onChunk?: (delta: number) => void;
}

/**
 * Any CUBE file resource: feed output, user upload, PACS file, and so on.
 */
export class FileModel<A extends Access> extends LinkedModel<"file", A> {
  static readonly linker: Linker<"file"> = {
    kind: "file",
    schema: DownloadableFileSchema,
    link<A extends Access>(
      http: HttpClient,
      object: DownloadableFile,
      access: A,
    ) {
      return new FileModel(http, object, access);
    },
  };

  constructor(http: HttpClient, object: DownloadableFile, access: A) {
    super(http, FileModel.linker, object, access);
  }

  get fname(): string {
    return this.object.fname;
  }

  get fsize(): number {
    return this.object.fsize;
  }

  /** Last path component of `fname`. */
  basename(): string {
    return basename(this.object.fname);
  }

  /** Request the file's contents. */
  async stream(): Promise<FileStream> {
    const res = await this.http.get(this.object.file_resource);
    return { body: res.body, size: this.object.fsize };
  }

  /**
   * Write the file's contents to `dst`. Fails with {@link FileIOError} if
   * `dst` exists, unless `clobber` is set.
   */
  async download(dst: string, options: DownloadOptions = {}): Promise<void> {
    const { body } = await this.stream();
    let file: FileHandle;
    try {
      file = await open(dst, options.clobber ? "w" : "wx");
    } catch (err) {
      await body?.cancel();
      throw new FileIOError(dst, `Cannot open ${dst} for writing`, {
        cause: err,
      });
    }

    try {
      if (body === null) return;
      await copyTo(body, file, dst, this.object.file_resource, options.onChunk);
    } finally {
      await file.close();
    }
  }
}

export function basename(fname: string): string {
  return fname.slice(fname.lastIndexOf("/") + 1);
}

async function copyTo(
  body: ReadableStream<Uint8Array>,
  file: FileHandle,
  dst: string,
  url: string,
  onChunk?: (delta: number) => void,
): Promise<void> {
  const reader = body.getReader();
  try {
    for (;;) {
      const chunk = await reader.read().catch((err: unknown) => {
        throw new RequestError("network", url, `Download of ${url} interrupted`, {
          cause: err,
        });
      });
      if (chunk.done) return;
      try {
        await writeChunk(file, chunk.value, dst);
        onChunk?.(chunk.value.byteLength);
      } catch (err) {
        // the body is still readable: release the connection
        await reader.cancel(err);
        throw err;
      }
    }
  } finally {
    reader.releaseLock();
  }
}

async function writeChunk(
  file: FileHandle,
  chunk: Uint8Array,
  dst: string,
): Promise<void> {
  try {
    await file.write(chunk);
  } catch (err) {
    throw new FileIOError(dst, `Cannot write to ${dst}`, { cause: err });
  }
}
