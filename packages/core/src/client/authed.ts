import { basename } from "node:path";
import { constants, openAsBlob } from "node:fs";
import { access } from "node:fs/promises";
import { FileIOError, NotFoundError } from "../errors/catalog.js";
import type { HttpClient } from "../http/client.js";
import type { ReadWrite } from "../models/access.js";
import { Feed } from "../models/feed.js";
import { FileModel } from "../models/file.js";
import { Pipeline } from "../models/pipeline.js";
import type { CanonPipeline } from "../pipeline/canon.js";
import type { CubeLinks } from "../schemas/cube.js";
import { FeedSearchBuilder, newQuery } from "../search/builder.js";
import {
  BaseClient,
  createHttp,
  fetchLinks,
  parseCubeUrl,
  type ClientOptions,
} from "./base.js";

/** A client logged in as `username`, able to create and modify resources. */
export class ChrisClient extends BaseClient<ReadWrite> {
  /**
   * Validate `url` and read the API root, authenticating with `token`. The
   * token is sent as `Authorization: Token <token>` with every request.
   */
  static async connect(
    url: string,
    username: string,
    token: string,
    options: ClientOptions = {},
  ): Promise<ChrisClient> {
    const cubeUrl = parseCubeUrl(url);
    const http = createHttp(options, { Authorization: `Token ${token}` });
    const links = await fetchLinks(http, cubeUrl);
    return new ChrisClient(http, cubeUrl, links, username, options);
  }

  private constructor(
    http: HttpClient,
    url: string,
    links: CubeLinks,
    readonly username: string,
    options: ClientOptions,
  ) {
    super(http, url, links, "rw", options);
  }

  /** Feeds owned by this user. */
  feeds(): FeedSearchBuilder<ReadWrite> {
    return this.configure(
      new FeedSearchBuilder(
        { http: this.http, linker: Feed.linker, logger: this.logger },
        newQuery(this.url, "search"),
        this.access,
      ),
    );
  }

  /**
   * Upload a local file to `<username>/uploads/<uploadPath>`. `onChunk`
   * receives the file size once the upload completes.
   */
  async uploadFile(
    localPath: string,
    uploadPath: string,
    onChunk?: (delta: number) => void,
  ): Promise<FileModel<ReadWrite>> {
    const url = this.links.userfiles ?? this.links.uploadedfiles;
    if (url === undefined) throw new NotFoundError("userfiles");

    let blob: Blob;
    try {
      await access(localPath, constants.R_OK);
      blob = await openAsBlob(localPath);
    } catch (err) {
      throw new FileIOError(localPath, `Cannot read ${localPath}`, {
        cause: err,
      });
    }

    const form = new FormData();
    form.append("upload_path", `${this.username}/uploads/${uploadPath}`);
    form.append("fname", blob, basename(localPath));
    this.logger?.debug({ localPath, uploadPath }, "Uploading file");
    const object = await this.http.postForm(url, form, FileModel.linker.schema);
    onChunk?.(blob.size);
    return new FileModel(this.http, object, this.access);
  }

  /** Add a pipeline to CUBE. Plugins it names must already be registered. */
  async uploadPipeline(pipeline: CanonPipeline): Promise<Pipeline<ReadWrite>> {
    this.logger?.debug({ name: pipeline.name }, "Uploading pipeline");
    const object = await this.http.sendJson(
      "POST",
      this.links.pipelines,
      pipeline,
      Pipeline.linker.schema,
    );
    return new Pipeline(this.http, object, this.access);
  }
}
