import { NotLoggedInError } from "@chris-ts/core/errors";
import type {
  CreateInstanceBody,
  PluginInstance,
  ReadWrite,
} from "@chris-ts/core/models";
import type { CommandContext } from "./context.js";

export interface RunArgs {
  /** `name` or `name@version`. */
  plugin: string;
  /** Instance whose output is the new instance's input. */
  previousId?: number;
  /** Plugin parameters by name. */
  params?: Record<string, string>;
}

/** Split `pl-dircopy@2.1.1` into name and version. */
export function parsePluginRef(ref: string): {
  name: string;
  version?: string;
} {
  const at = ref.lastIndexOf("@");
  return at <= 0
    ? { name: ref }
    : { name: ref.slice(0, at), version: ref.slice(at + 1) };
}

/**
 * Create an instance of a plugin and print its id. Without a version, the
 * version CUBE lists first is run.
 */
export async function runCommand(
  ctx: CommandContext,
  args: RunArgs,
): Promise<PluginInstance<ReadWrite>> {
  const { client } = ctx;
  if (client.access !== "rw") throw new NotLoggedInError("run");

  const { name, version } = parsePluginRef(args.plugin);
  const plugin = await client.getPlugin(name, version);

  const body: CreateInstanceBody = {};
  for (const [param, value] of Object.entries(args.params ?? {})) {
    body[param] = value;
  }
  if (args.previousId !== undefined) body.previous_id = args.previousId;

  const instance = await plugin.createInstance(body);
  ctx.logger.info(
    { plugin: plugin.nameAndVersion, id: instance.object.id },
    "Created plugin instance",
  );
  ctx.print(String(instance.object.id));
  return instance;
}
