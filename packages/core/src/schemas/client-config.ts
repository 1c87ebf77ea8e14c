import { z } from "zod";

export const DEFAULTS = {
  cube: {
    url: "http://localhost:8000/api/v1/",
    retries: 3,
    timeoutMs: 60_000,
  },
  transfer: {
    concurrency: 4,
    progressThreshold: 10 * 1024 * 1024,
  },
  logging: {
    level: "info" as const,
    pretty: false,
  },
};

/** A CUBE API address, e.g. `https://cube.chrisproject.org/api/v1/` */
export const CubeUrlSchema = z
  .string()
  .regex(/^https?:\/\//, 'must start with "http://" or "https://"')
  .endsWith("/api/v1/", 'must end with "/api/v1/"');

export const ClientConfigSchema = z.object({
  cube: z
    .object({
      url: CubeUrlSchema.default(DEFAULTS.cube.url),
      username: z.string().min(1).optional(),
      token: z.string().min(1).optional(),
      retries: z.number().int().min(0).max(20).default(DEFAULTS.cube.retries),
      timeoutMs: z
        .number()
        .int()
        .positive()
        .default(DEFAULTS.cube.timeoutMs)
        .describe("Time each request attempt may wait for response headers"),
      pageLimit: z
        .number()
        .int()
        .positive()
        .optional()
        .describe("Page size requested from collection endpoints"),
    })
    .default(DEFAULTS.cube),
  transfer: z
    .object({
      concurrency: z
        .number()
        .int()
        .positive()
        .default(DEFAULTS.transfer.concurrency),
      progressThreshold: z
        .number()
        .int()
        .min(0)
        .default(DEFAULTS.transfer.progressThreshold)
        .describe("Files at least this many bytes get their own progress bar"),
    })
    .default(DEFAULTS.transfer),
  logging: z
    .object({
      level: z
        .enum(["fatal", "error", "warn", "info", "debug"])
        .default(DEFAULTS.logging.level),
      pretty: z.boolean().default(DEFAULTS.logging.pretty),
    })
    .default(DEFAULTS.logging),
});

export type ClientConfig = z.infer<typeof ClientConfigSchema>;
export type LoggingConfig = ClientConfig["logging"];
export type TransferConfig = ClientConfig["transfer"];
