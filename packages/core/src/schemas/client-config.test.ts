import { describe, it, expect } from "vitest";
import { ZodError } from "zod";
import { ClientConfigSchema, CubeUrlSchema } from "./client-config.js";

describe("ClientConfigSchema", () => {
  it("fills every section with defaults", () => {
    const config = ClientConfigSchema.parse({});

    expect(config.cube.url).toBe("http://localhost:8000/api/v1/");
    expect(config.cube.retries).toBe(3);
    expect(config.cube.username).toBeUndefined();
    expect(config.cube.token).toBeUndefined();
    expect(config.cube.pageLimit).toBeUndefined();
    expect(config.transfer.concurrency).toBe(4);
    expect(config.transfer.progressThreshold).toBe(10 * 1024 * 1024);
    expect(config.logging).toEqual({ level: "info", pretty: false });
  });

  it("keeps credentials and page limit", () => {
    const config = ClientConfigSchema.parse({
      cube: {
        url: "https://cube.example.org/api/v1/",
        username: "chris",
        token: "test-token",
        pageLimit: 50,
      },
    });

    expect(config.cube.url).toBe("https://cube.example.org/api/v1/");
    expect(config.cube.username).toBe("chris");
    expect(config.cube.token).toBe("test-token");
    expect(config.cube.pageLimit).toBe(50);
    expect(config.cube.retries).toBe(3);
  });

  it("rejects non-positive concurrency", () => {
    expect(() =>
      ClientConfigSchema.parse({ transfer: { concurrency: 0 } }),
    ).toThrow(ZodError);
  });

  it("rejects unknown log levels", () => {
    expect(() =>
      ClientConfigSchema.parse({ logging: { level: "verbose" } }),
    ).toThrow(ZodError);
  });
});

describe("CubeUrlSchema", () => {
  it.each([
    "http://localhost/api/v1/",
    "http://localhost:8000/api/v1/",
    "https://cube.example.org/api/v1/",
  ])("accepts %s", (url) => {
    expect(CubeUrlSchema.safeParse(url).success).toBe(true);
  });

  it.each([
    "idk://localhost/api/v1/",
    "localhost/api/v1/",
    "http://localhost",
    "http://localhost/api/v2/",
    "http://localhost/api/v1",
  ])("rejects %s", (url) => {
    expect(CubeUrlSchema.safeParse(url).success).toBe(false);
  });
});
