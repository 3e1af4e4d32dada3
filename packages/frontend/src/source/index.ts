export type { SourceCatalogOptions } from "./config.js";
export {
  defaultSourceCatalogOptions,
  resolveSourceCatalogOptions,
} from "./config.js";
export { extractClassDeclarations } from "./declarations.js";
export {
  loadSourceCatalog,
  parseSources,
  sourceCatalogFromText,
  sourceCatalogFromTexts,
} from "./source-catalog.js";
