/**
 * Pipelines the way CUBE stores them.
 *
 * CUBE takes `plugin_tree` as a JSON-encoded string: a list of pipings, each
 * pointing at its parent by position (`previous_index`). Files may carry
 * the tree either encoded or as a plain list ("expanded").
 */

import { z } from "zod";
import { InvalidPipelineError } from "../errors/catalog.js";
import { PluginParameterValueSchema } from "../schemas/cube.js";

export const ExpandedTreeParameterSchema = z.object({
  name: z.string().min(1),
  default: PluginParameterValueSchema,
});
export type ExpandedTreeParameter = z.infer<typeof ExpandedTreeParameterSchema>;

export const ExpandedTreePipingSchema = z.object({
  title: z.string().min(1),
  plugin_name: z.string().min(1),
  plugin_version: z.string().min(1),
  previous_index: z.number().int().min(0).nullable(),
  plugin_parameter_defaults: z.array(ExpandedTreeParameterSchema).optional(),
});
export type ExpandedTreePiping = z.infer<typeof ExpandedTreePipingSchema>;

/** Fields every pipeline representation shares. */
export const pipelineMetaShape = {
  authors: z.string(),
  name: z.string().min(1),
  description: z.string(),
  category: z.string(),
  locked: z.boolean().default(true),
};

const PluginTreeSchema = z
  .array(ExpandedTreePipingSchema)
  .superRefine((tree, ctx) => {
    const roots = tree.filter((piping) => piping.previous_index === null);
    if (roots.length !== 1) {
      ctx.addIssue({
        code: "custom",
        message: `expected exactly one root, found ${roots.length}`,
      });
    }
    tree.forEach((piping, index) => {
      const previous = piping.previous_index;
      if (previous !== null && (previous >= tree.length || previous === index)) {
        ctx.addIssue({
          code: "custom",
          path: [index, "previous_index"],
          message: `no other piping at index ${previous}`,
        });
      }
    });
  });

export const ExpandedTreePipelineSchema = z.object({
  ...pipelineMetaShape,
  plugin_tree: PluginTreeSchema,
});
export type ExpandedTreePipeline = z.infer<typeof ExpandedTreePipelineSchema>;

/**
 * A pipeline whose `plugin_tree` may still be JSON-encoded. The tree itself
 * is validated by {@link expandPipeline}.
 */
export const PossiblyExpandedPipelineSchema = z.object({
  ...pipelineMetaShape,
  plugin_tree: z.union([z.string(), z.array(z.unknown())]),
});
export type PossiblyExpandedPipeline = z.infer<
  typeof PossiblyExpandedPipelineSchema
>;

/** Request body of `POST pipelines/`. */
export interface CanonPipeline {
  authors: string;
  name: string;
  description: string;
  category: string;
  locked: boolean;
  plugin_tree: string;
}

export function canonicalize(pipeline: ExpandedTreePipeline): CanonPipeline {
  return {
    authors: pipeline.authors,
    name: pipeline.name,
    description: pipeline.description,
    category: pipeline.category,
    locked: pipeline.locked,
    plugin_tree: JSON.stringify(pipeline.plugin_tree),
  };
}

/** Decode `plugin_tree` if it is still a string, and validate it. */
export function expandPipeline(
  pipeline: PossiblyExpandedPipeline,
): ExpandedTreePipeline {
  const { plugin_tree } = pipeline;
  let tree: unknown = plugin_tree;
  if (typeof plugin_tree === "string") {
    try {
      tree = JSON.parse(plugin_tree);
    } catch (err) {
      throw new InvalidPipelineError(
        `plugin_tree is not valid JSON: ${err instanceof Error ? err.message : String(err)}`,
      );
    }
  }
  const parsed = PluginTreeSchema.safeParse(tree);
  if (!parsed.success) {
    throw invalidPipeline(parsed.error, ["plugin_tree"]);
  }
  return { ...pipeline, plugin_tree: parsed.data };
}

/** {@link InvalidPipelineError} listing every issue of a failed parse. */
export function invalidPipeline(
  error: z.ZodError,
  prefix: readonly PropertyKey[] = [],
): InvalidPipelineError {
  const issues = error.issues.map((issue) => {
    const path = [...prefix, ...issue.path].map(String).join(".");
    return path === "" ? issue.message : `${path}: ${issue.message}`;
  });
  return new InvalidPipelineError(`Invalid pipeline: ${issues.join("; ")}`, {
    issues,
  });
}
