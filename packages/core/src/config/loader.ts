import { readFile, writeFile, mkdir } from "node:fs/promises";
import { dirname } from "node:path";
import {
  ClientConfigSchema,
  type ClientConfig,
} from "../schemas/client-config.js";
import { configFilePath } from "./paths.js";

export interface LoadConfigOptions {
  configPath?: string;
  rootPath?: string;
}

function configPathOf(options?: LoadConfigOptions): string {
  return options?.configPath ?? configFilePath(options?.rootPath);
}

export async function loadConfig(
  options?: LoadConfigOptions,
): Promise<ClientConfig> {
  const configPath = configPathOf(options);

  let raw: string | undefined;
  try {
    raw = await readFile(configPath, "utf-8");
  } catch (err: unknown) {
    if (
      !(err instanceof Error && "code" in err && err.code === "ENOENT")
    ) {
      throw err;
    }
    // missing file: defaults only
  }

  const parsed: unknown = raw !== undefined ? JSON.parse(raw) : {};
  const config = ClientConfigSchema.parse(parsed);

  // Write back so that defaults are visible and editable in config.json
  if (raw !== undefined) {
    const serialized = JSON.stringify(config, null, 2) + "\n";
    if (serialized !== raw) {
      await writeFile(configPath, serialized);
    }
  }

  return config;
}

export async function saveConfig(
  config: ClientConfig,
  options?: LoadConfigOptions,
): Promise<void> {
  const configPath = configPathOf(options);
  await mkdir(dirname(configPath), { recursive: true });
  await writeFile(configPath, JSON.stringify(config, null, 2) + "\n", {
    encoding: "utf-8",
    mode: 0o600,
  });
}
