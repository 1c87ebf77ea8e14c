import type { Access } from "../models/access.js";
import type { Search } from "../search/search.js";
import { AnonChrisClient } from "./anon.js";
import { ChrisClient } from "./authed.js";
import type { ClientOptions } from "./base.js";

/** Either kind of client. Narrow on `access` to reach write operations. */
export type Client = AnonChrisClient | ChrisClient;

export interface Credentials {
  username?: string;
  token?: string;
}

/** Log in when both username and token are given, otherwise connect anonymously. */
export async function connect(
  url: string,
  credentials: Credentials = {},
  options: ClientOptions = {},
): Promise<Client> {
  const { username, token } = credentials;
  if (username !== undefined && token !== undefined) {
    return ChrisClient.connect(url, username, token, options);
  }
  return AnonChrisClient.connect(url, options);
}

/** Feeds owned by the client's user: none for anonymous clients. */
export function ownFeeds(client: Client): Search<"feed", Access> {
  return client.access === "rw" ? client.feeds().search() : client.feeds();
}
