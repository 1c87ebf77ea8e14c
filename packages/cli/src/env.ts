import {
  ClientConfigSchema,
  type ClientConfig,
} from "@chris-ts/core/schemas";

export type Env = Record<string, string | undefined>;

/**
 * Overlay the `CHRIS_URL`, `CHRIS_USERNAME`, `CHRIS_TOKEN` and
 * `CHRIS_RETRIES` variables on `config`. The result is validated again, so a
 * bad value fails the same way a bad config file does.
 */
export function applyEnv(config: ClientConfig, env: Env): ClientConfig {
  const { CHRIS_URL, CHRIS_USERNAME, CHRIS_TOKEN, CHRIS_RETRIES } = env;
  return ClientConfigSchema.parse({
    ...config,
    cube: {
      ...config.cube,
      ...(CHRIS_URL !== undefined && { url: CHRIS_URL }),
      ...(CHRIS_USERNAME !== undefined && { username: CHRIS_USERNAME }),
      ...(CHRIS_TOKEN !== undefined && { token: CHRIS_TOKEN }),
      ...(CHRIS_RETRIES !== undefined && { retries: Number(CHRIS_RETRIES) }),
    },
  });
}
