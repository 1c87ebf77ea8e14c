import type { Access } from "@chris-ts/core/models";
import type { Search } from "@chris-ts/core/search";
import { downloadAll, type ExecutionReport } from "@chris-ts/core/transfer";
import { withProgress, type CommandContext } from "./context.js";

export interface DownloadArgs {
  /** Path prefix of the files to download, e.g. `chris/feed_12`. */
  src: string;
  dst: string;
  shorten?: number;
  clobber?: boolean;
}

/** Download every file under `src` into `dst`, printing each local path. */
export async function downloadCommand(
  ctx: CommandContext,
  args: DownloadArgs,
): Promise<ExecutionReport<string>> {
  const search: Search<"file", Access> = ctx.client
    .files()
    .fname(args.src)
    .search();
  const length = await search.count();

  const report = await withProgress(ctx, length, (events) =>
    downloadAll(search, args.dst, {
      length,
      concurrency: ctx.config.transfer.concurrency,
      prefix: args.src,
      shorten: args.shorten,
      clobber: args.clobber,
      events,
      logger: ctx.logger,
    }),
  );
  for (const path of report.results) {
    ctx.print(path);
  }
  return report;
}
