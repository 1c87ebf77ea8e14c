import { describe, it, expect, beforeEach } from "vitest";
import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { FileIOError, RemoteError } from "../errors/catalog.js";
import { ChrisClient } from "../client/authed.js";
import { createFakeCube, CUBE_URL, type FakeCube } from "../test-utils/fake-cube.js";
import { Channel } from "./channel.js";
import type { InputFile } from "./discover.js";
import { MultiFileTransferProgress, type TransferEvent } from "./progress.js";
import { recordFileErrors, uploadAll, uploadFiles, uploadPathOf } from "./upload.js";

describe("uploadPathOf", () => {
  const file: InputFile = { path: "/tmp/study/a.txt", relative: "study/a.txt", size: 1 };

  it("joins the destination and the relative path", () => {
    expect(uploadPathOf(file, "2024/scans")).toBe("2024/scans/study/a.txt");
    expect(uploadPathOf(file, "")).toBe("study/a.txt");
  });
});

describe("recordFileErrors", () => {
  it("records local file errors only", () => {
    expect(recordFileErrors(new FileIOError("/x", "Cannot read /x"))).toBe("record");
    expect(recordFileErrors(new RemoteError(500, "Internal Server Error", CUBE_URL, ""))).toBe("abort");
  });
});

describe("upload", () => {
  let cube: FakeCube;
  let client: ChrisClient;
  let dir: string;

  beforeEach(async () => {
    cube = createFakeCube();
    cube.addCollection("userfiles", []);
    client = await ChrisClient.connect(CUBE_URL, "chris", "test-token", {
      fetch: cube.fetch,
    });
    dir = await mkdtemp(join(tmpdir(), "upload-test-"));
    return () => rm(dir, { recursive: true });
  });

  it("records a missing file and uploads the rest", async () => {
    const files: InputFile[] = [];
    for (let i = 0; i < 4; i++) {
      const path = join(dir, `f${i}.txt`);
      await writeFile(path, `file ${i}`);
      files.push({ path, relative: `f${i}.txt`, size: 6 });
    }
    files.splice(2, 0, {
      path: join(dir, "gone.txt"),
      relative: "gone.txt",
      size: 3,
    });
    const events = new Channel<TransferEvent>();

    const report = await uploadFiles(client, files, "batch", {
      concurrency: 2,
      events,
    });
    events.close();
    const progress = new MultiFileTransferProgress(files.length, 1);
    await progress.consume(events);

    expect(report.completed).toBe(5);
    expect(report.results.map((r) => r.fname).sort()).toEqual([
      "chris/uploads/batch/f0.txt",
      "chris/uploads/batch/f1.txt",
      "chris/uploads/batch/f2.txt",
      "chris/uploads/batch/f3.txt",
    ]);
    expect(report.failures).toHaveLength(1);
    expect(report.failures[0]?.id).toBe(2);
    expect(report.failures[0]?.label).toBe(join(dir, "gone.txt"));
    expect(report.failures[0]?.error).toBeInstanceOf(FileIOError);
    expect(progress.completedFiles).toBe(5);
    expect(progress.totalSize()).toBe(27);
    expect(cube.contents.get("chris/uploads/batch/f3.txt")).toBe("file 3");
  });

  it("uploads a directory tree", async () => {
    const study = join(dir, "study");
    await mkdir(join(study, "sub"), { recursive: true });
    await writeFile(join(study, "a.txt"), "a");
    await writeFile(join(study, "sub", "b.txt"), "b");

    const report = await uploadAll(client, [study], "", { concurrency: 4 });

    expect(report.results.map((r) => r.fname).sort()).toEqual([
      "chris/uploads/study/a.txt",
      "chris/uploads/study/sub/b.txt",
    ]);
    expect(report.failures).toEqual([]);
  });

  it("tracks overlapping arguments as separate transfers", async () => {
    const d = join(dir, "d");
    await mkdir(d);
    await writeFile(join(d, "a.txt"), "0123456789");
    const events = new Channel<TransferEvent>();
    const progress = new MultiFileTransferProgress(2, 1);
    const consumed = progress.consume(events);

    const report = await uploadAll(client, [d, join(d, "a.txt")], "x", {
      concurrency: 2,
      events,
    });
    events.close();
    await consumed;

    expect(report.results.map((r) => r.fname).sort()).toEqual([
      "chris/uploads/x/a.txt",
      "chris/uploads/x/d/a.txt",
    ]);
    expect(progress.totalSize()).toBe(20);
    expect(progress.completedFiles).toBe(2);
    expect(progress.activeBars).toEqual([]);
  });
});
