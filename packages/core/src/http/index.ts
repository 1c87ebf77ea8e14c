export {
  HttpClient,
  withQuery,
  type FetchFn,
  type HttpClientOptions,
  type HttpRequest,
  type Middleware,
  type Next,
  type QueryParams,
  type SendInit,
} from "./client.js";
export { check, decode, readJson } from "./check.js";
export {
  backoffDelay,
  classify,
  retryTransient,
  type Outcome,
  type Retryable,
  type RetryOptions,
} from "./retry.js";
