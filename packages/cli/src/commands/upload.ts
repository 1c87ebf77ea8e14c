import { NotLoggedInError } from "@chris-ts/core/errors";
import {
  discoverInputFiles,
  uploadFiles,
  type ExecutionReport,
  type UploadResult,
} from "@chris-ts/core/transfer";
import { withProgress, type CommandContext } from "./context.js";

export interface UploadArgs {
  paths: string[];
  /** Folder under `<username>/uploads/`. */
  dest: string;
}

/**
 * Upload files and directories, printing the CUBE path of each uploaded
 * file. Unreadable local files are logged and skipped.
 */
export async function uploadCommand(
  ctx: CommandContext,
  args: UploadArgs,
): Promise<ExecutionReport<UploadResult>> {
  const { client } = ctx;
  if (client.access !== "rw") throw new NotLoggedInError("upload");

  const files = await discoverInputFiles(args.paths);
  const report = await withProgress(ctx, files.length, (events) =>
    uploadFiles(client, files, args.dest, {
      concurrency: ctx.config.transfer.concurrency,
      events,
      logger: ctx.logger,
    }),
  );
  for (const result of report.results) {
    ctx.print(result.fname);
  }
  return report;
}
