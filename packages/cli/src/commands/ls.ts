import type { CommandContext } from "./context.js";
import { listingOf, type Resource } from "./listing.js";

export interface LsArgs {
  resource: Resource;
  filter?: string;
  /** Stop after this many items. */
  limit?: number;
}

/**
 * Print one line per item: `name version` for plugins, `fname` for files,
 * `id name` for feeds and pipelines. Returns the number of lines.
 */
export async function lsCommand(
  ctx: CommandContext,
  args: LsArgs,
): Promise<number> {
  let printed = 0;
  const listing = listingOf(ctx.client, args.resource, {
    filter: args.filter,
    limit: args.limit,
  });
  for await (const line of listing.lines()) {
    ctx.print(line);
    printed++;
  }
  return printed;
}
