import type { CommandContext } from "./context.js";
import { listingOf, type Resource } from "./listing.js";

export interface CountArgs {
  resource: Resource;
  filter?: string;
}

/** Print the number of `resource` items matching the filter. */
export async function countCommand(
  ctx: CommandContext,
  args: CountArgs,
): Promise<number> {
  const count = await listingOf(ctx.client, args.resource, {
    filter: args.filter,
  }).count();
  ctx.print(String(count));
  return count;
}
