export { AnonChrisClient } from "./anon.js";
export { ChrisClient } from "./authed.js";
export {
  BaseClient,
  createHttp,
  fetchLinks,
  parseCubeUrl,
  type ClientOptions,
} from "./base.js";
export { connect, ownFeeds, type Client, type Credentials } from "./either.js";
export { createAccount, getAuthToken, type NewAccount } from "./auth.js";
