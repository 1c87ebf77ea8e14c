export {
  ClientConfigSchema,
  CubeUrlSchema,
  DEFAULTS,
  type ClientConfig,
  type LoggingConfig,
  type TransferConfig,
} from "./client-config.js";
export {
  PageSchema,
  CountSchema,
  CubeLinksSchema,
  BaseResponseSchema,
  AuthTokenSchema,
  UserCreatedSchema,
  PluginTypeSchema,
  PluginSchema,
  PluginParameterSchema,
  PluginParameterValueSchema,
  PluginInstanceSchema,
  PluginInstanceStatusSchema,
  PluginInstanceParameterSchema,
  FeedSchema,
  NoteSchema,
  PipelineSchema,
  PipingSchema,
  PipelineDefaultParameterSchema,
  WorkflowSchema,
  DownloadableFileSchema,
  type Paginated,
  type CubeLinks,
  type BaseResponse,
  type UserCreated,
  type PluginResponse,
  type PluginParameter,
  type PluginParameterValue,
  type PluginInstanceResponse,
  type PluginInstanceStatus,
  type PluginInstanceParameter,
  type FeedResponse,
  type NoteResponse,
  type PipelineResponse,
  type PipingResponse,
  type PipelineDefaultParameter,
  type WorkflowResponse,
  type DownloadableFile,
} from "./cube.js";
