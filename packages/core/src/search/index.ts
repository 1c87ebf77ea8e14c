export {
  initialUrl,
  LIMIT_ONE,
  LIMIT_ZERO,
  type CollectionQuery,
  type QueryValue,
  type SearchMode,
} from "./query.js";
export { ActiveSearch, EmptySearch, type Search } from "./search.js";
export {
  FeedSearchBuilder,
  FileSearchBuilder,
  newQuery,
  PipelineSearchBuilder,
  PluginInstanceSearchBuilder,
  PluginSearchBuilder,
  QueryBuilder,
  SearchBuilder,
  WorkflowSearchBuilder,
  type SearchSource,
} from "./builder.js";
