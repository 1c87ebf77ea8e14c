import { parseArgs } from "node:util";
import { connect } from "@chris-ts/core/client";
import { loadConfig } from "@chris-ts/core/config";
import { ChrisError } from "@chris-ts/core/errors";
import type { FetchFn } from "@chris-ts/core/http";
import { createLogger, type Logger } from "@chris-ts/core/logger";
import type { ClientConfig } from "@chris-ts/core/schemas";
import { ZodError } from "zod";
import {
  countCommand,
  downloadCommand,
  isResource,
  lsCommand,
  pipelineAddCommand,
  RESOURCES,
  runCommand,
  uploadCommand,
  type CommandContext,
  type Resource,
} from "./commands/index.js";
import { applyEnv, type Env } from "./env.js";

export const USAGE = `Usage: chris-ts <command> [options]

Commands:
  count <${RESOURCES.join("|")}> [filter]
  ls <${RESOURCES.join("|")}> [filter] [--limit N]
  download <src> [dst] [--shorten N] [--clobber]
  upload <path>... [--dest FOLDER]
  run <plugin[@version]> [--previous ID] [-p name=value]...
  pipeline-add <file.json|file.yml>

Environment: CHRIS_URL, CHRIS_USERNAME, CHRIS_TOKEN, CHRIS_RETRIES, CHRIS_ROOT_PATH`;

export interface CliOptions {
  /** Default: `process.env` */
  env?: Env;
  fetch?: FetchFn;
  /** Default: a logger built from the loaded config. */
  logger?: Logger;
  /** Command output. Default: stdout. */
  print?: (line: string) => void;
  /** Usage and configuration problems. Default: stderr. */
  printError?: (line: string) => void;
}

class UsageError extends ChrisError {
  constructor(message: string) {
    super("USAGE", message);
  }
}

const COMMANDS = [
  "count",
  "ls",
  "download",
  "upload",
  "run",
  "pipeline-add",
] as const;

function isCommand(value: string): value is (typeof COMMANDS)[number] {
  return COMMANDS.some((command) => command === value);
}

const EXIT_OK = 0;
const EXIT_FAILURE = 1;
const EXIT_USAGE = 2;

/** Run one command. Resolves with the process exit code. */
export async function runCli(
  argv: readonly string[],
  options: CliOptions = {},
): Promise<number> {
  const env = options.env ?? process.env;
  const print: (line: string) => void =
    options.print ?? ((line) => process.stdout.write(`${line}\n`));
  const printError: (line: string) => void =
    options.printError ?? ((line) => process.stderr.write(`${line}\n`));

  let parsed: ReturnType<typeof parse>;
  try {
    parsed = parse(argv);
  } catch (err) {
    printError(err instanceof Error ? err.message : String(err));
    printError(USAGE);
    return EXIT_USAGE;
  }
  if (parsed.values.help) {
    print(USAGE);
    return EXIT_OK;
  }
  const [command] = parsed.positionals;
  if (command === undefined || !isCommand(command)) {
    printError(
      command === undefined ? "Missing command" : `Unknown command: ${command}`,
    );
    printError(USAGE);
    return EXIT_USAGE;
  }

  let config: ClientConfig;
  try {
    config = applyEnv(await loadConfig({ rootPath: env.CHRIS_ROOT_PATH }), env);
  } catch (err) {
    if (!(err instanceof ZodError)) throw err;
    printError(`Invalid configuration: ${err.issues.map(describeIssue).join("; ")}`);
    return EXIT_USAGE;
  }
  const logger = options.logger ?? createLogger(config.logging);

  try {
    const client = await connect(
      config.cube.url,
      { username: config.cube.username, token: config.cube.token },
      {
        fetch: options.fetch,
        retries: config.cube.retries,
        timeoutMs: config.cube.timeoutMs,
        pageLimit: config.cube.pageLimit,
        logger,
      },
    );
    return await dispatch({ client, config, logger, print }, parsed);
  } catch (err) {
    if (err instanceof UsageError) {
      printError(err.message);
      printError(USAGE);
      return EXIT_USAGE;
    }
    if (err instanceof ChrisError) {
      logger.error({ code: err.code, details: err.details }, err.message);
      return EXIT_FAILURE;
    }
    throw err;
  }
}

function parse(argv: readonly string[]) {
  return parseArgs({
    args: [...argv],
    allowPositionals: true,
    strict: true,
    options: {
      limit: { type: "string" },
      shorten: { type: "string" },
      clobber: { type: "boolean" },
      dest: { type: "string" },
      previous: { type: "string" },
      param: { type: "string", short: "p", multiple: true },
      help: { type: "boolean", short: "h" },
    },
  });
}

async function dispatch(
  ctx: CommandContext,
  { values, positionals }: ReturnType<typeof parse>,
): Promise<number> {
  const [command, ...rest] = positionals;
  switch (command) {
    case "count": {
      const [resource, filter] = rest;
      await countCommand(ctx, { resource: resourceArg(resource), filter });
      return EXIT_OK;
    }
    case "ls": {
      const [resource, filter] = rest;
      await lsCommand(ctx, {
        resource: resourceArg(resource),
        filter,
        limit: intFlag("limit", values.limit),
      });
      return EXIT_OK;
    }
    case "download": {
      const [src, dst = "."] = rest;
      if (src === undefined) throw new UsageError("download: missing <src>");
      const report = await downloadCommand(ctx, {
        src,
        dst,
        shorten: intFlag("shorten", values.shorten),
        clobber: values.clobber,
      });
      return report.failures.length === 0 ? EXIT_OK : EXIT_FAILURE;
    }
    case "upload": {
      if (rest.length === 0) throw new UsageError("upload: missing <path>");
      const report = await uploadCommand(ctx, {
        paths: rest,
        dest: values.dest ?? "",
      });
      return report.failures.length === 0 ? EXIT_OK : EXIT_FAILURE;
    }
    case "run": {
      const [plugin] = rest;
      if (plugin === undefined) throw new UsageError("run: missing <plugin>");
      await runCommand(ctx, {
        plugin,
        previousId: intFlag("previous", values.previous),
        params: paramsOf(values.param ?? []),
      });
      return EXIT_OK;
    }
    case "pipeline-add": {
      const [file] = rest;
      if (file === undefined) throw new UsageError("pipeline-add: missing <file>");
      await pipelineAddCommand(ctx, { file });
      return EXIT_OK;
    }
    default:
      throw new UsageError(`Unknown command: ${command}`);
  }
}

function resourceArg(value: string | undefined): Resource {
  if (value === undefined || !isResource(value)) {
    throw new UsageError(
      `Expected one of ${RESOURCES.join(", ")}, got ${value ?? "nothing"}`,
    );
  }
  return value;
}

function intFlag(name: string, value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new UsageError(`--${name} must be a non-negative integer, got ${value}`);
  }
  return parsed;
}

function paramsOf(pairs: readonly string[]): Record<string, string> {
  const params: Record<string, string> = {};
  for (const pair of pairs) {
    const eq = pair.indexOf("=");
    if (eq <= 0) throw new UsageError(`Expected name=value, got ${pair}`);
    params[pair.slice(0, eq)] = pair.slice(eq + 1);
  }
  return params;
}

function describeIssue(issue: ZodError["issues"][number]): string {
  return `${issue.path.join(".")}: ${issue.message}`;
}
