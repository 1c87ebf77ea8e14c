import { describe, it, expect, vi } from "vitest";
import { Channel } from "./channel.js";
import { MultiFileTransferProgress, type TransferEvent } from "./progress.js";

describe("MultiFileTransferProgress", () => {
  it("gives a sub-bar only to files at or above the threshold", () => {
    const addBar = vi.fn();
    const progress = new MultiFileTransferProgress(3, 100, { addBar });

    progress.update({ type: "start", id: 1, name: "a.txt", size: 50 });
    progress.update({ type: "start", id: 2, name: "b.txt", size: 100 });
    progress.update({ type: "start", id: 3, name: "c.txt", size: 300 });

    expect(progress.activeBars).toEqual([2, 3]);
    expect(addBar.mock.calls).toEqual([
      [2, "b.txt", 100],
      [3, "c.txt", 300],
    ]);
    expect(progress.totalSize()).toBe(450);
  });

  it("advances and removes sub-bars", () => {
    const advanceBar = vi.fn();
    const removeBar = vi.fn();
    const overall = vi.fn();
    const progress = new MultiFileTransferProgress(2, 100, {
      advanceBar,
      removeBar,
      overall,
    });

    progress.update({ type: "start", id: 1, name: "s", size: 10 });
    progress.update({ type: "start", id: 2, name: "b", size: 200 });
    progress.update({ type: "chunk", id: 1, delta: 10 });
    progress.update({ type: "chunk", id: 2, delta: 120 });
    progress.update({ type: "chunk", id: 2, delta: 80 });
    progress.update({ type: "done", id: 1 });
    progress.update({ type: "done", id: 2 });

    expect(advanceBar.mock.calls).toEqual([
      [2, 120, 200],
      [2, 200, 200],
    ]);
    expect(removeBar.mock.calls).toEqual([[2]]);
    expect(overall.mock.calls).toEqual([
      [1, 2],
      [2, 2],
    ]);
    expect(progress.activeBars).toEqual([]);
    expect(progress.completedFiles).toBe(2);
  });

  it("counts every start toward the total size", () => {
    const progress = new MultiFileTransferProgress(2, 1000);

    progress.update({ type: "start", id: 0, name: "a.txt", size: 10 });
    progress.update({ type: "start", id: 1, name: "a.txt", size: 10 });

    expect(progress.totalSize()).toBe(20);
  });

  it("consumes events from a channel until it closes", async () => {
    const events = new Channel<TransferEvent>();
    const progress = new MultiFileTransferProgress(2, 1000);
    const consumed = progress.consume(events);

    events.send({ type: "start", id: 1, name: "a", size: 5 });
    events.send({ type: "done", id: 1 });
    events.send({ type: "start", id: 2, name: "b", size: 7 });
    events.send({ type: "done", id: 2 });
    events.close();
    await consumed;

    expect(progress.completedFiles).toBe(2);
    expect(progress.totalSize()).toBe(12);
  });
});
