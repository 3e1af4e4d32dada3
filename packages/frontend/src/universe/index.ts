/**
 * Semantic model: types, declaration catalog, catalog-backed type system
 */

export * from "./types.js";
export type {
  CatalogOptions,
  ClassDeclaration,
  ClassEntry,
  DeclarationCatalog,
  MemberDeclaration,
} from "./catalog.js";
export {
  buildDeclarationCatalog,
  makeClassId,
  updateDeclarationCatalog,
} from "./catalog.js";
export { createMemberTypeSystem } from "./type-system.js";
