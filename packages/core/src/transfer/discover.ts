import { readdir, stat } from "node:fs/promises";
import { basename, join, posix } from "node:path";
import { FileIOError } from "../errors/catalog.js";

export interface InputFile {
  /** Local path. */
  path: string;
  /**
   * `/`-separated path relative to the argument it was found under. A
   * directory argument contributes its own name as the first component.
   */
  relative: string;
  size: number;
}

/**
 * Expand `paths` into the files under them, recursing into directories.
 * Fails with {@link FileIOError} on the first path that does not exist.
 */
export async function discoverInputFiles(
  paths: readonly string[],
): Promise<InputFile[]> {
  const files: InputFile[] = [];
  for (const path of paths) {
    files.push(...(await filesUnder(path, basename(path))));
  }
  return files;
}

async function filesUnder(path: string, relative: string): Promise<InputFile[]> {
  const info = await stat(path).catch((err: unknown) => {
    throw new FileIOError(path, `File not found: ${path}`, { cause: err });
  });
  if (info.isFile()) {
    return [{ path, relative, size: info.size }];
  }
  if (!info.isDirectory()) {
    return [];
  }

  const entries = await readdir(path).catch((err: unknown) => {
    throw new FileIOError(path, `Cannot list ${path}`, { cause: err });
  });
  const files: InputFile[] = [];
  for (const name of entries.sort()) {
    files.push(
      ...(await filesUnder(join(path, name), posix.join(relative, name))),
    );
  }
  return files;
}
