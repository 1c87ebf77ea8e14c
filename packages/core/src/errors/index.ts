export {
  ChrisError,
  RequestError,
  RemoteError,
  EmptyCollectionError,
  TooManyResultsError,
  NotFoundError,
  NotLoggedInError,
  InvalidCubeUrlError,
  InvalidPipelineError,
  UnderfullError,
  OverfullError,
  FileIOError,
  type RequestFailure,
} from "./catalog.js";
