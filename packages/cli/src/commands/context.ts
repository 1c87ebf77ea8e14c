import type { Client } from "@chris-ts/core/client";
import type { Logger } from "@chris-ts/core/logger";
import type { ClientConfig } from "@chris-ts/core/schemas";
import {
  Channel,
  MultiFileTransferProgress,
  type ProgressRenderer,
  type TransferEvent,
} from "@chris-ts/core/transfer";

export interface CommandContext {
  client: Client;
  config: ClientConfig;
  logger: Logger;
  /** Writes one line of command output to stdout. */
  print: (line: string) => void;
}

function logRenderer(logger: Logger): ProgressRenderer {
  return {
    addBar: (id, name, size) => logger.debug({ id, name, size }, "Transfer started"),
    removeBar: (id) => logger.debug({ id }, "Transfer finished"),
    overall: (done, total) => logger.debug({ done, total }, "Files transferred"),
  };
}

/**
 * Run `transfer` with a progress aggregator consuming its events. The
 * channel is closed and drained before this returns.
 */
export async function withProgress<R>(
  ctx: CommandContext,
  totalFiles: number,
  transfer: (events: Channel<TransferEvent>) => Promise<R>,
): Promise<R> {
  const events = new Channel<TransferEvent>();
  const progress = new MultiFileTransferProgress(
    totalFiles,
    ctx.config.transfer.progressThreshold,
    logRenderer(ctx.logger),
  );
  const consumed = progress.consume(events);
  try {
    return await transfer(events);
  } finally {
    events.close();
    await consumed;
  }
}
