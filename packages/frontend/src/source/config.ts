/**
 * Source catalog configuration
 */

import ts from "typescript";

export type SourceCatalogOptions = {
  /** Prefix for every class stableId */
  readonly projectName: string;
  readonly verbose: boolean;
};

export const defaultSourceCatalogOptions: SourceCatalogOptions = {
  projectName: "source",
  verbose: false,
};

export const resolveSourceCatalogOptions = (
  options: Partial<SourceCatalogOptions> = {}
): SourceCatalogOptions => ({
  projectName: options.projectName ?? defaultSourceCatalogOptions.projectName,
  verbose: options.verbose ?? defaultSourceCatalogOptions.verbose,
});

/**
 * Compiler options for syntax-only parsing. Nothing is resolved or type
 * checked, so no lib or imported file is ever read.
 */
export const parseOnlyCompilerOptions: ts.CompilerOptions = {
  target: ts.ScriptTarget.ES2022,
  noLib: true,
  noResolve: true,
  noEmit: true,
  types: [],
  allowJs: false,
};
