export { runCli, USAGE, type CliOptions } from "./cli.js";
export { applyEnv, type Env } from "./env.js";
export * from "./commands/index.js";
