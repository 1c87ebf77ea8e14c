import { describe, it, expect, beforeEach } from "vitest";
import { z } from "zod";
import { HttpClient } from "../http/client.js";
import { RemoteError } from "../errors/catalog.js";
import { createFakeCube, CUBE_URL, type FakeCube } from "../test-utils/fake-cube.js";
import {
  feedItem,
  pluginInstanceItem,
  pluginItem,
} from "../test-utils/fixtures.js";
import { FeedSchema, PluginInstanceSchema, PluginSchema } from "../schemas/cube.js";
import { Feed } from "./feed.js";
import { Pipeline } from "./pipeline.js";
import { Plugin } from "./plugin.js";
import { PluginInstance } from "./plugin-instance.js";

describe("linked models", () => {
  let cube: FakeCube;
  let http: HttpClient;

  beforeEach(() => {
    cube = createFakeCube();
    http = new HttpClient({ fetch: cube.fetch });
  });

  describe("Plugin", () => {
    it("lists its parameters", async () => {
      const plugin = new Plugin(http, PluginSchema.parse(pluginItem(1)), "ro");
      cube.addCollection("plugins/1/parameters", [
        {
          url: `${CUBE_URL}plugins/parameters/1/`,
          id: 1,
          name: "dir",
          type: "string",
          optional: true,
          default: "",
          flag: "--dir",
          action: "store",
          plugin: `${CUBE_URL}plugins/1/`,
        },
      ]);

      const params: string[] = [];
      for await (const p of plugin.getParameters().search().stream()) {
        params.push(p.flag);
      }

      expect(params).toEqual(["--dir"]);
      expect(cube.requests).toEqual([`GET ${CUBE_URL}plugins/1/parameters/`]);
    });

    it("creates an instance from its instances link", async () => {
      const plugin = new Plugin(http, PluginSchema.parse(pluginItem(1)), "rw");
      let body: unknown;
      cube.route("POST", "/api/v1/plugins/1/instances/", async (req) => {
        body = await req.json();
        return Response.json(pluginInstanceItem(9, { previous_id: 3 }), {
          status: 201,
        });
      });

      const instance = await plugin.createInstance({ previous_id: 3, dir: "x" });

      expect(instance).toBeInstanceOf(PluginInstance);
      expect(instance.object.id).toBe(9);
      expect(instance.access).toBe("rw");
      expect(body).toEqual({ previous_id: 3, dir: "x" });
    });
  });

  describe("PluginInstance", () => {
    it("fetches its feed lazily", async () => {
      cube.addCollection("publicfeeds", [feedItem(1, "brains")]);
      const instance = new PluginInstance(
        http,
        PluginInstanceSchema.parse(pluginInstanceItem(4)),
        "ro",
      );

      const lazy = instance.feed();
      expect(cube.requests).toEqual([]);
      const feed = await lazy.get();

      expect(feed).toBeInstanceOf(Feed);
      expect(feed.object.name).toBe("brains");
      expect(cube.requests).toEqual([`GET ${CUBE_URL}1/`]);
    });

    it("has no previous instance at the root of a feed", () => {
      const root = new PluginInstance(
        http,
        PluginInstanceSchema.parse(pluginInstanceItem(1)),
        "ro",
      );
      const child = new PluginInstance(
        http,
        PluginInstanceSchema.parse(
          pluginInstanceItem(2, {
            previous_id: 1,
            previous: `${CUBE_URL}plugins/instances/1/`,
          }),
        ),
        "ro",
      );

      expect(root.previous()).toBeNull();
      expect(child.previous()?.url).toBe(`${CUBE_URL}plugins/instances/1/`);
    });

    it("updates its title", async () => {
      cube.route("PUT", "/api/v1/plugins/instances/4/", async (req) => {
        const { title } = z.object({ title: z.string() }).parse(await req.json());
        return Response.json(pluginInstanceItem(4, { title }));
      });
      const instance = new PluginInstance(
        http,
        PluginInstanceSchema.parse(pluginInstanceItem(4)),
        "rw",
      );

      const renamed = await instance.setTitle("renamed");

      expect(renamed.object.title).toBe("renamed");
      expect(instance.object.title).toBe("");
    });

    it("deletes itself", async () => {
      cube.route(
        "DELETE",
        "/api/v1/plugins/instances/4/",
        () => new Response(null, { status: 204 }),
      );
      const instance = new PluginInstance(
        http,
        PluginInstanceSchema.parse(pluginInstanceItem(4)),
        "rw",
      );

      await instance.delete();

      expect(cube.requests).toEqual([
        `DELETE ${CUBE_URL}plugins/instances/4/`,
      ]);
    });
  });

  describe("Feed", () => {
    it("refreshes from its own URL", async () => {
      cube.addCollection("publicfeeds", [feedItem(3, "after")]);
      const stale = new Feed(http, FeedSchema.parse(feedItem(3, "before")), "rw");

      const fresh = await stale.refresh();

      expect(fresh.object.name).toBe("after");
      expect(fresh.access).toBe("rw");
    });

    it("surfaces a rejected rename", async () => {
      cube.failNext("/api/v1/3/", 403, 1, '{"detail":"Forbidden"}');
      const feed = new Feed(http, FeedSchema.parse(feedItem(3)), "rw");

      await expect(feed.setName("nope")).rejects.toBeInstanceOf(RemoteError);
    });

    it("downgrades to read-only", () => {
      const feed = new Feed(http, FeedSchema.parse(feedItem(3)), "rw");

      const ro = feed.intoReadOnly();

      expect(ro).toBeInstanceOf(Feed);
      expect(ro.access).toBe("ro");
      expect(ro.object).toBe(feed.object);
    });
  });

  describe("Pipeline", () => {
    it("creates a workflow after a plugin instance", async () => {
      let body: unknown;
      cube.route("POST", "/api/v1/pipelines/2/workflows/", async (req) => {
        body = await req.json();
        return Response.json(
          {
            url: `${CUBE_URL}pipelines/workflows/5/`,
            id: 5,
            creation_date: "2024-01-01T00:00:00.000000-05:00",
            pipeline_id: 2,
            pipeline_name: "Fetal brain",
            owner_username: "chris",
            pipeline: `${CUBE_URL}pipelines/2/`,
          },
          { status: 201 },
        );
      });
      const url = `${CUBE_URL}pipelines/2/`;
      const pipeline = new Pipeline(
        http,
        {
          url,
          id: 2,
          name: "Fetal brain",
          locked: true,
          authors: "",
          category: "",
          description: "",
          owner_username: "chris",
          creation_date: "2024-01-01T00:00:00.000000-05:00",
          plugins: `${url}plugins/`,
          plugin_pipings: `${url}pipings/`,
          default_parameters: `${url}parameters/`,
          workflows: `${url}workflows/`,
        },
        "rw",
      );

      const workflow = await pipeline.createWorkflow(7, "run it");

      expect(workflow.object.id).toBe(5);
      expect(body).toEqual({ previous_plugin_inst_id: 7, title: "run it" });
    });
  });
});
