/**
 * Progress of a multi-file transfer.
 *
 * Transfer tasks report {@link TransferEvent}s over a channel; one consumer
 * folds them into per-file sub-bars and an overall file counter. Only files
 * of at least `threshold` bytes get a sub-bar, so that thousands of small
 * files do not flood the display.
 */

/** `id` is the task id the executor assigned, unique within one run. */
export type TransferEvent =
  | { type: "start"; id: number; name: string; size: number }
  | { type: "chunk"; id: number; delta: number }
  | { type: "done"; id: number };

/** Receives the display changes. Every method is optional. */
export interface ProgressRenderer {
  addBar?(id: number, name: string, size: number): void;
  advanceBar?(id: number, position: number, size: number): void;
  removeBar?(id: number): void;
  overall?(done: number, total: number): void;
}

interface Bar {
  size: number;
  position: number;
}

export class MultiFileTransferProgress {
  private readonly bars = new Map<number, Bar>();
  private done = 0;
  private total = 0;

  constructor(
    readonly totalFiles: number,
    readonly threshold: number,
    private readonly renderer: ProgressRenderer = {},
  ) {}

  update(event: TransferEvent): void {
    switch (event.type) {
      case "start": {
        this.total += event.size;
        if (event.size >= this.threshold) {
          this.bars.set(event.id, { size: event.size, position: 0 });
          this.renderer.addBar?.(event.id, event.name, event.size);
        }
        return;
      }
      case "chunk": {
        const bar = this.bars.get(event.id);
        if (bar === undefined) return;
        bar.position += event.delta;
        this.renderer.advanceBar?.(event.id, bar.position, bar.size);
        return;
      }
      case "done": {
        if (this.bars.delete(event.id)) {
          this.renderer.removeBar?.(event.id);
        }
        this.done++;
        this.renderer.overall?.(this.done, this.totalFiles);
        return;
      }
    }
  }

  /** Sum of the sizes of every start event so far. */
  totalSize(): number {
    return this.total;
  }

  get completedFiles(): number {
    return this.done;
  }

  /** Files with a sub-bar, i.e. started, large, not yet done. */
  get activeBars(): number[] {
    return [...this.bars.keys()];
  }

  /** Apply every event until `events` ends. */
  async consume(events: AsyncIterable<TransferEvent>): Promise<void> {
    for await (const event of events) {
      this.update(event);
    }
  }
}
