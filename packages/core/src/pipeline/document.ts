import { readFile } from "node:fs/promises";
import { extname } from "node:path";
import { parse as parseYaml } from "yaml";
import { FileIOError, InvalidPipelineError } from "../errors/catalog.js";
import {
  expandPipeline,
  invalidPipeline,
  PossiblyExpandedPipelineSchema,
  type ExpandedTreePipeline,
} from "./canon.js";
import {
  expandTitleIndexed,
  TitleIndexedPipelineSchema,
} from "./title-indexed.js";

/**
 * `json`: CUBE's form, `plugin_tree` encoded or expanded.
 * `yaml`: the title-indexed form.
 */
export type PipelineFormat = "json" | "yaml";

export function pipelineFormatOf(path: string): PipelineFormat {
  const ext = extname(path).toLowerCase();
  if (ext === ".json") return "json";
  if (ext === ".yml" || ext === ".yaml") return "yaml";
  throw new InvalidPipelineError(`Unsupported file type: ${path}`, { path });
}

export function parsePipeline(
  text: string,
  format: PipelineFormat,
): ExpandedTreePipeline {
  if (format === "json") {
    const parsed = PossiblyExpandedPipelineSchema.safeParse(
      decode(() => JSON.parse(text), "JSON"),
    );
    if (!parsed.success) throw invalidPipeline(parsed.error);
    return expandPipeline(parsed.data);
  }

  const parsed = TitleIndexedPipelineSchema.safeParse(
    decode(() => parseYaml(text), "YAML"),
  );
  if (!parsed.success) throw invalidPipeline(parsed.error);
  return expandTitleIndexed(parsed.data);
}

/** Read and validate a `.json`, `.yml` or `.yaml` pipeline file. */
export async function readPipelineFile(
  path: string,
): Promise<ExpandedTreePipeline> {
  const format = pipelineFormatOf(path);
  const text = await readFile(path, "utf-8").catch((err: unknown) => {
    throw new FileIOError(path, `Cannot read ${path}`, { cause: err });
  });
  try {
    return parsePipeline(text, format);
  } catch (err) {
    if (err instanceof InvalidPipelineError) {
      throw new InvalidPipelineError(`${path}: ${err.message}`, {
        path,
        ...err.details,
      });
    }
    throw err;
  }
}

function decode(parse: () => unknown, syntax: string): unknown {
  try {
    return parse();
  } catch (err) {
    throw new InvalidPipelineError(
      `Not valid ${syntax}: ${err instanceof Error ? err.message : String(err)}`,
    );
  }
}
