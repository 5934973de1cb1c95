export { buildPlanetDocument } from "./document";
export type {
  PlanetDocument,
  PlanetInfo,
  RenderInput,
  Renderer,
  SourceStatus,
} from "./document";

export { createJsonRenderer } from "./json-renderer";
