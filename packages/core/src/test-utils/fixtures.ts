import { CUBE_URL, type Item } from "./fake-cube.js";

export function pluginItem(
  id: number,
  name = `pl-test-${id}`,
  version = "1.0.0",
): Item {
  const url = `${CUBE_URL}plugins/${id}/`;
  return {
    url,
    id,
    name,
    version,
    dock_image: `ghcr.io/fnndsc/${name}:${version}`,
    type: "ds",
    title: "",
    category: "",
    description: "",
    creation_date: "2024-01-01T00:00:00.000000-05:00",
    parameters: `${url}parameters/`,
    instances: `${url}instances/`,
  };
}

export function pluginInstanceItem(
  id: number,
  overrides: Partial<Item> = {},
): Item {
  const url = `${CUBE_URL}plugins/instances/${id}/`;
  return {
    url,
    id,
    title: "",
    previous_id: null,
    plugin_id: 1,
    plugin_name: "pl-test-1",
    plugin_version: "1.0.0",
    plugin_type: "ds",
    feed_id: 1,
    start_date: "2024-01-01T00:00:00.000000-05:00",
    end_date: "2024-01-01T00:00:00.000000-05:00",
    output_path: `chris/feed_1/pl-test-1_${id}/data`,
    status: "finishedSuccessfully",
    owner_username: "chris",
    previous: null,
    feed: `${CUBE_URL}1/`,
    plugin: `${CUBE_URL}plugins/1/`,
    descendants: `${url}descendants/`,
    files: `${url}files/`,
    parameters: `${url}parameters/`,
    ...overrides,
  };
}

export function feedItem(id: number, name = `feed ${id}`): Item {
  const url = `${CUBE_URL}${id}/`;
  return {
    url,
    id,
    name,
    creation_date: "2024-01-01T00:00:00.000000-05:00",
    note: `${CUBE_URL}note${id}/`,
    plugin_instances: `${url}plugininstances/`,
    files: `${url}files/`,
  };
}

export function pipelineItem(id: number, name = `pipeline ${id}`): Item {
  const url = `${CUBE_URL}pipelines/${id}/`;
  return {
    url,
    id,
    name,
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
  };
}
