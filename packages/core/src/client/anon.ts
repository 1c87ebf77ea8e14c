import type { ReadOnly } from "../models/access.js";
import { EmptySearch } from "../search/search.js";
import {
  BaseClient,
  createHttp,
  fetchLinks,
  parseCubeUrl,
  type ClientOptions,
} from "./base.js";

/** A client for the public parts of CUBE. Everything it returns is read-only. */
export class AnonChrisClient extends BaseClient<ReadOnly> {
  /** Validate `url` and read the API root. */
  static async connect(
    url: string,
    options: ClientOptions = {},
  ): Promise<AnonChrisClient> {
    const cubeUrl = parseCubeUrl(url);
    const http = createHttp(options);
    const links = await fetchLinks(http, cubeUrl);
    return new AnonChrisClient(http, cubeUrl, links, "ro", options);
  }

  readonly username = null;

  /** Anonymous users own no feeds. Makes no request. */
  feeds(): EmptySearch<"feed", ReadOnly> {
    return new EmptySearch("ro");
  }
}
