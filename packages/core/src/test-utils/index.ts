export { createFakeCube, CUBE_URL, type FakeCube, type Item } from "./fake-cube.js";
export {
  feedItem,
  pipelineItem,
  pluginInstanceItem,
  pluginItem,
} from "./fixtures.js";
