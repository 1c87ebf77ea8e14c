import { STATUS_CODES } from "node:http";
import type { z } from "zod";
import { RemoteError, RequestError } from "../errors/catalog.js";

/**
 * Pass 2xx responses through; turn anything else into a {@link RemoteError}
 * carrying the response body verbatim.
 */
export async function check(
  res: Response,
  url: string = res.url,
): Promise<Response> {
  if (res.ok) return res;
  const reason = res.statusText || STATUS_CODES[res.status] || "unknown reason";
  let body: string;
  try {
    body = await res.text();
  } catch (err) {
    throw new RequestError(
      "network",
      url,
      `Failed to read error response (${res.status} ${reason})`,
      { cause: err },
    );
  }
  throw new RemoteError(res.status, reason, url, body);
}

/** Decode a JSON body and validate it against `schema`. */
export async function readJson<T>(
  res: Response,
  schema: z.ZodType<T>,
  url: string,
): Promise<T> {
  let raw: unknown;
  try {
    raw = await res.json();
  } catch (err) {
    throw new RequestError("decode", url, `Invalid JSON from ${url}`, {
      cause: err,
    });
  }
  return decode(schema, raw, url);
}

/** Validate an already-parsed value, failing as a decode error. */
export function decode<T>(schema: z.ZodType<T>, raw: unknown, url: string): T {
  const result = schema.safeParse(raw);
  if (!result.success) {
    throw new RequestError(
      "decode",
      url,
      `Unexpected response shape from ${url}: ${result.error.message}`,
      { cause: result.error },
    );
  }
  return result.data;
}
