import { homedir } from "node:os";
import { join, resolve } from "node:path";

/** Where settings live unless `CHRIS_ROOT_PATH` or an option says otherwise. */
export const DEFAULT_ROOT_PATH = "~/.chris-ts";

export const CONFIG_FILE_NAME = "config.json";

/** `~` and `~/…` are taken relative to the home directory. */
export function expandHomePath(path: string): string {
  if (path !== "~" && !path.startsWith("~/")) return path;
  return join(homedir(), path.slice(2));
}

/** Absolute form of `rootPath`. */
export function resolveRootPath(rootPath: string = DEFAULT_ROOT_PATH): string {
  return resolve(expandHomePath(rootPath));
}

/** `config.json` under the resolved root path. */
export function configFilePath(rootPath?: string): string {
  return join(resolveRootPath(rootPath), CONFIG_FILE_NAME);
}
