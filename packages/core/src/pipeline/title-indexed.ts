/**
 * The human-friendly pipeline format usually written as YAML: each piping
 * names its parent by `title`, the plugin is one `"name vVERSION"` string,
 * and parameter defaults are a plain mapping.
 *
 * ```yaml
 * plugin_tree:
 *   - title: copy
 *     plugin: pl-dircopy v2.1.1
 *     previous: null
 *   - title: resize
 *     plugin: pl-resize v1.0.0
 *     previous: copy
 *     plugin_parameter_defaults:
 *       size: 256
 * ```
 */

import { z } from "zod";
import { InvalidPipelineError } from "../errors/catalog.js";
import { PluginParameterValueSchema } from "../schemas/cube.js";
import {
  pipelineMetaShape,
  type ExpandedTreePipeline,
  type ExpandedTreePiping,
} from "./canon.js";

export const TitleIndexedPipingSchema = z.object({
  title: z.string().min(1),
  plugin: z.string(),
  previous: z.string().nullish(),
  plugin_parameter_defaults: z
    .record(z.string(), PluginParameterValueSchema)
    .nullish(),
});
export type TitleIndexedPiping = z.infer<typeof TitleIndexedPipingSchema>;

export const TitleIndexedPipelineSchema = z.object({
  ...pipelineMetaShape,
  plugin_tree: z.array(TitleIndexedPipingSchema),
});
export type TitleIndexedPipeline = z.infer<typeof TitleIndexedPipelineSchema>;

/**
 * Split `"pl-dircopy v2.1.1"` at its last `v`, which must follow a space.
 */
export function parsePluginString(plugin: string): {
  name: string;
  version: string;
} {
  const at = plugin.lastIndexOf("v");
  const name = plugin.slice(0, at);
  const version = plugin.slice(at + 1);
  if (at === -1 || !name.endsWith(" ") || name.trim() === "" || version === "") {
    throw new InvalidPipelineError(
      `"${plugin}" cannot be parsed as (plugin_name, plugin_version)`,
      { plugin },
    );
  }
  return { name: name.trimEnd(), version };
}

type Placed = TitleIndexedPiping & { previous_index: number | null };

/**
 * Convert to CUBE's list form. The root comes first; the children of a
 * piping are placed together, followed by each child's own descendants in
 * turn.
 */
export function expandTitleIndexed(
  pipeline: TitleIndexedPipeline,
): ExpandedTreePipeline {
  const { plugin_tree: tree } = pipeline;

  const seen = new Set<string>();
  for (const { title } of tree) {
    if (seen.has(title)) {
      throw new InvalidPipelineError(
        `\`plugin_tree\` contains duplicate title: "${title}"`,
        { title },
      );
    }
    seen.add(title);
  }

  const roots = tree.filter((piping) => piping.previous == null);
  const [root] = roots;
  if (root === undefined) {
    throw new InvalidPipelineError(
      "At least one element of `plugin_tree` must be the root (i.e. `previous` is null)",
    );
  }
  if (roots.length > 1) {
    const titles = roots.map((piping) => piping.title);
    throw new InvalidPipelineError(
      `Multiple elements of \`plugin_tree\` found to be the root: ${titles.join(", ")}`,
      { titles },
    );
  }

  const byPrevious = new Map<string, TitleIndexedPiping[]>();
  for (const piping of tree) {
    if (piping.previous == null) continue;
    const siblings = byPrevious.get(piping.previous) ?? [];
    siblings.push(piping);
    byPrevious.set(piping.previous, siblings);
  }

  const drain = (
    previousIndex: number,
    previousTitle: string,
    firstIndex: number,
  ): Placed[] => {
    const children = byPrevious.get(previousTitle);
    if (children === undefined) return [];
    byPrevious.delete(previousTitle);

    const placed = children.map((child) => ({
      ...child,
      previous_index: previousIndex,
    }));
    const descendants: Placed[] = [];
    let next = firstIndex + children.length;
    placed.forEach((child, i) => {
      const below = drain(firstIndex + i, child.title, next);
      next += below.length;
      descendants.push(...below);
    });
    return [...placed, ...descendants];
  };

  const placed: Placed[] = [
    { ...root, previous_index: null },
    ...drain(0, root.title, 1),
  ];
  if (byPrevious.size > 0) {
    const disconnected = [...byPrevious.keys()];
    throw new InvalidPipelineError(
      `Some \`previous\` are not connected to \`plugin_tree\`: ${disconnected.join(", ")}`,
      { previous: disconnected },
    );
  }

  return {
    authors: pipeline.authors,
    name: pipeline.name,
    description: pipeline.description,
    category: pipeline.category,
    locked: pipeline.locked,
    plugin_tree: placed.map(toExpandedPiping),
  };
}

function toExpandedPiping(piping: Placed): ExpandedTreePiping {
  const { name, version } = parsePluginString(piping.plugin);
  const defaults = piping.plugin_parameter_defaults;
  return {
    title: piping.title,
    plugin_name: name,
    plugin_version: version,
    previous_index: piping.previous_index,
    ...(defaults != null && {
      plugin_parameter_defaults: Object.entries(defaults).map(
        ([param, value]) => ({ name: param, default: value }),
      ),
    }),
  };
}
