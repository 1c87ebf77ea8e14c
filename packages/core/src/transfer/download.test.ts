import { describe, it, expect, beforeEach } from "vitest";
import { mkdtemp, readFile, readdir, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { AnonChrisClient } from "../client/anon.js";
import { createFakeCube, CUBE_URL, type FakeCube } from "../test-utils/fake-cube.js";
import { Channel } from "./channel.js";
import { downloadAll, shortenFname, targetPath } from "./download.js";
import type { TransferEvent } from "./progress.js";

const NESTED = "chris/feed_1/pl-dircopy_1/data/pl-ls_2/data/out/result.txt";

describe("shortenFname", () => {
  it.each([
    [0, NESTED],
    [1, "pl-ls_2/data/out/result.txt"],
    [2, "out/result.txt"],
    [3, "out/result.txt"],
  ])("drops %i data segments", (times, expected) => {
    expect(shortenFname(NESTED, times)).toBe(expected);
  });

  it("leaves paths without data segments alone", () => {
    expect(shortenFname("chris/uploads/scan.nii", 2)).toBe("chris/uploads/scan.nii");
  });
});

describe("targetPath", () => {
  it("strips the prefix before shortening", () => {
    expect(
      targetPath(NESTED, "/out", { prefix: "chris/feed_1/", shorten: 1 }),
    ).toBe("/out/pl-ls_2/data/out/result.txt");
  });

  it("keeps fnames outside the prefix whole", () => {
    expect(targetPath("chris/uploads/a.txt", "/out", { prefix: "chris/feed_1" })).toBe(
      "/out/chris/uploads/a.txt",
    );
  });
});

describe("downloadAll", () => {
  let cube: FakeCube;
  let client: AnonChrisClient;
  let dir: string;

  beforeEach(async () => {
    cube = createFakeCube();
    cube.addFile("chris/feed_1/pl-dircopy_1/data/a.txt", "alpha");
    cube.addFile("chris/feed_1/pl-dircopy_1/data/sub/b.txt", "beta");
    cube.addFile("chris/feed_2/pl-dircopy_3/data/c.txt", "gamma");
    client = await AnonChrisClient.connect(CUBE_URL, { fetch: cube.fetch });
    dir = await mkdtemp(join(tmpdir(), "download-test-"));
    return () => rm(dir, { recursive: true });
  });

  it("writes every file of a search under the destination", async () => {
    const events = new Channel<TransferEvent>();
    const search = client.files().fname("chris/feed_1/").search();

    const report = await downloadAll(search, dir, {
      concurrency: 2,
      prefix: "chris/feed_1",
      shorten: 1,
      events,
    });
    events.close();
    let bytes = 0;
    for await (const event of events) {
      if (event.type === "chunk") bytes += event.delta;
    }

    expect(report.completed).toBe(2);
    expect([...report.results].sort()).toEqual([
      join(dir, "a.txt"),
      join(dir, "sub", "b.txt"),
    ]);
    expect(await readFile(join(dir, "a.txt"), "utf-8")).toBe("alpha");
    expect(await readFile(join(dir, "sub", "b.txt"), "utf-8")).toBe("beta");
    expect(bytes).toBe(9);
  });

  it("does nothing for an empty search", async () => {
    const search = client.files().fname("chris/feed_9/").search();

    const report = await downloadAll(search, dir, { concurrency: 2 });

    expect(report).toEqual({ completed: 0, results: [], failures: [] });
    expect(await readdir(dir)).toEqual([]);
  });
});
