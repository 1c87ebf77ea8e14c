/**
 * Response shapes of the CUBE API.
 *
 * Only the fields this client reads are declared; zod strips the rest.
 */

import { z } from "zod";

/**
 * Page of a collection endpoint. `count` is the total across all pages.
 * Items are validated separately, against the resource's own schema.
 */
export const PageSchema = z.object({
  count: z.number().int().min(0),
  next: z.string().nullable(),
  previous: z.string().nullable(),
  results: z.array(z.unknown()),
});

export type Paginated<T> = {
  count: number;
  next: string | null;
  previous: string | null;
  results: T[];
};

export const CountSchema = z.object({
  count: z.number().int().min(0),
});

export const CubeLinksSchema = z.object({
  public_feeds: z.string(),
  files: z.string().optional(),
  plugins: z.string(),
  plugin_instances: z.string(),
  pipelines: z.string(),
  pipeline_instances: z.string().optional(),
  workflows: z.string().optional(),
  tags: z.string().optional(),
  pacsfiles: z.string().optional(),
  filebrowser: z.string().optional(),
  // renamed from "uploadedfiles" in newer CUBE
  userfiles: z.string().optional(),
  uploadedfiles: z.string().optional(),
  user: z.string().optional(),
});
export type CubeLinks = z.infer<typeof CubeLinksSchema>;

export const BaseResponseSchema = z.object({
  count: z.number().int().nullable().optional(),
  collection_links: CubeLinksSchema,
});
export type BaseResponse = z.infer<typeof BaseResponseSchema>;

export const AuthTokenSchema = z.object({ token: z.string() });

/** Response of `POST users/`. */
export const UserCreatedSchema = z.object({
  url: z.string(),
  id: z.number().int(),
  username: z.string(),
  email: z.string(),
});
export type UserCreated = z.infer<typeof UserCreatedSchema>;

export const PluginTypeSchema = z.enum(["ds", "fs", "ts"]);

export const PluginSchema = z.object({
  url: z.string(),
  id: z.number().int(),
  name: z.string(),
  version: z.string(),
  dock_image: z.string(),
  type: PluginTypeSchema,
  title: z.string().default(""),
  category: z.string().default(""),
  description: z.string().default(""),
  creation_date: z.string(),
  parameters: z.string(),
  instances: z.string(),
  compute_resources: z.string().optional(),
});
export type PluginResponse = z.infer<typeof PluginSchema>;

export const PluginParameterValueSchema = z.union([
  z.boolean(),
  z.number(),
  z.string(),
]);
export type PluginParameterValue = z.infer<typeof PluginParameterValueSchema>;

export const PluginParameterSchema = z.object({
  url: z.string(),
  id: z.number().int(),
  name: z.string(),
  type: z.enum(["boolean", "integer", "float", "string", "path", "unextpath"]),
  optional: z.boolean(),
  default: PluginParameterValueSchema.nullable().optional(),
  flag: z.string(),
  short_flag: z.string().default(""),
  action: z.string(),
  help: z.string().default(""),
  ui_exposed: z.boolean().default(true),
  plugin: z.string(),
});
export type PluginParameter = z.infer<typeof PluginParameterSchema>;

export const PluginInstanceStatusSchema = z.enum([
  "created",
  "waiting",
  "scheduled",
  "started",
  "registeringFiles",
  "finishedSuccessfully",
  "finishedWithError",
  "cancelled",
]);
export type PluginInstanceStatus = z.infer<typeof PluginInstanceStatusSchema>;

export const PluginInstanceSchema = z.object({
  url: z.string(),
  id: z.number().int(),
  title: z.string(),
  previous_id: z.number().int().nullable().optional(),
  plugin_id: z.number().int(),
  plugin_name: z.string(),
  plugin_version: z.string(),
  plugin_type: PluginTypeSchema,
  feed_id: z.number().int(),
  start_date: z.string(),
  end_date: z.string(),
  output_path: z.string(),
  status: PluginInstanceStatusSchema,
  owner_username: z.string(),
  // compute_resource is null when the resource was deleted
  compute_resource_name: z.string().nullable().optional(),
  previous: z.string().nullable(),
  feed: z.string(),
  plugin: z.string(),
  descendants: z.string(),
  files: z.string().optional(),
  output_folder: z.string().optional(),
  parameters: z.string(),
});
export type PluginInstanceResponse = z.infer<typeof PluginInstanceSchema>;

export const PluginInstanceParameterSchema = z.object({
  url: z.string(),
  id: z.number().int(),
  param_name: z.string(),
  value: PluginParameterValueSchema,
  type: z.string(),
  plugin_param: z.string(),
});
export type PluginInstanceParameter = z.infer<
  typeof PluginInstanceParameterSchema
>;

export const FeedSchema = z.object({
  url: z.string(),
  id: z.number().int(),
  name: z.string(),
  creation_date: z.string(),
  modification_date: z.string().optional(),
  creator_username: z.string().optional(),
  owner_username: z.string().optional(),
  public: z.boolean().optional(),
  note: z.string(),
  plugin_instances: z.string(),
  files: z.string().optional(),
  folder: z.string().optional(),
});
export type FeedResponse = z.infer<typeof FeedSchema>;

export const NoteSchema = z.object({
  url: z.string(),
  id: z.number().int(),
  title: z.string(),
  content: z.string(),
  feed: z.string(),
});
export type NoteResponse = z.infer<typeof NoteSchema>;

export const PipelineSchema = z.object({
  url: z.string(),
  id: z.number().int(),
  name: z.string(),
  locked: z.boolean(),
  authors: z.string().default(""),
  category: z.string().default(""),
  description: z.string().default(""),
  owner_username: z.string(),
  creation_date: z.string(),
  modification_date: z.string().optional(),
  plugins: z.string(),
  plugin_pipings: z.string(),
  default_parameters: z.string(),
  workflows: z.string(),
});
export type PipelineResponse = z.infer<typeof PipelineSchema>;

export const PipingSchema = z.object({
  url: z.string(),
  id: z.number().int(),
  previous_id: z.number().int().nullable(),
  title: z.string(),
  plugin_id: z.number().int(),
  plugin_name: z.string(),
  plugin_version: z.string(),
});
export type PipingResponse = z.infer<typeof PipingSchema>;

export const PipelineDefaultParameterSchema = z.object({
  url: z.string(),
  id: z.number().int(),
  param_name: z.string(),
  param_id: z.number().int(),
  plugin_piping_id: z.number().int(),
  plugin_piping_title: z.string().optional(),
  value: PluginParameterValueSchema.nullable(),
});
export type PipelineDefaultParameter = z.infer<
  typeof PipelineDefaultParameterSchema
>;

export const WorkflowSchema = z.object({
  url: z.string(),
  id: z.number().int(),
  creation_date: z.string(),
  pipeline_id: z.number().int(),
  pipeline_name: z.string(),
  owner_username: z.string(),
  pipeline: z.string(),
  title: z.string().optional(),
});
export type WorkflowResponse = z.infer<typeof WorkflowSchema>;

/** Any CUBE resource with `file_resource`, `fname`, and `fsize`. */
export const DownloadableFileSchema = z.object({
  url: z.string(),
  id: z.number().int(),
  fname: z.string(),
  fsize: z.number().int().min(0),
  file_resource: z.string(),
  creation_date: z.string().optional(),
  owner_username: z.string().optional(),
});
export type DownloadableFile = z.infer<typeof DownloadableFileSchema>;
