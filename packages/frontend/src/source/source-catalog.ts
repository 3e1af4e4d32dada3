/**
 * Source catalog - DeclarationCatalog from TypeScript declaration source
 */

import ts from "typescript";
import * as fs from "node:fs";
import * as path from "node:path";
import type { Result } from "../types/result.js";
import { error, flatMap, ok } from "../types/result.js";
import type { Diagnostic } from "../types/diagnostic.js";
import { createDiagnostic, hasErrors } from "../types/diagnostic.js";
import type { DeclarationCatalog } from "../universe/catalog.js";
import { buildDeclarationCatalog } from "../universe/catalog.js";
import type { SourceCatalogOptions } from "./config.js";
import {
  parseOnlyCompilerOptions,
  resolveSourceCatalogOptions,
} from "./config.js";
import { convertSyntaxDiagnostic } from "./diagnostics.js";
import { extractClassDeclarations } from "./declarations.js";

/**
 * Parse in-memory sources and collect their syntax diagnostics.
 *
 * A program is created only to ask for syntactic diagnostics; the compiler
 * host serves the given texts and nothing else is read.
 */
export const parseSources = (
  sources: ReadonlyMap<string, string>
): Result<readonly ts.SourceFile[], Diagnostic[]> => {
  const sourceFiles = new Map<string, ts.SourceFile>();
  for (const [fileName, text] of sources) {
    sourceFiles.set(
      fileName,
      ts.createSourceFile(fileName, text, ts.ScriptTarget.ES2022, true)
    );
  }

  const baseHost = ts.createCompilerHost(parseOnlyCompilerOptions);
  const host: ts.CompilerHost = {
    ...baseHost,
    getSourceFile: (fileName, languageVersion) =>
      sourceFiles.get(fileName) ??
      baseHost.getSourceFile(fileName, languageVersion),
    fileExists: (fileName) =>
      sourceFiles.has(fileName) || baseHost.fileExists(fileName),
  };

  const program = ts.createProgram({
    rootNames: [...sourceFiles.keys()],
    options: parseOnlyCompilerOptions,
    host,
  });

  const diagnostics = [...sourceFiles.values()].flatMap((sf) =>
    program.getSyntacticDiagnostics(sf).map(convertSyntaxDiagnostic)
  );

  if (hasErrors(diagnostics)) {
    return error(diagnostics);
  }

  return ok([...sourceFiles.values()]);
};

/**
 * Build a catalog from several in-memory source texts, keyed by file name.
 */
export const sourceCatalogFromTexts = (
  sources: ReadonlyMap<string, string>,
  options: Partial<SourceCatalogOptions> = {}
): Result<DeclarationCatalog, Diagnostic[]> => {
  const resolved = resolveSourceCatalogOptions(options);

  return flatMap(parseSources(sources), (sourceFiles) => {
    const declarations = extractClassDeclarations(sourceFiles);

    if (resolved.verbose) {
      for (const declaration of declarations) {
        console.log(
          `[Source Catalog] ${declaration.kind ?? "class"} ${declaration.name}: ${declaration.members.length} member(s)`
        );
      }
    }

    return buildDeclarationCatalog(declarations, {
      projectName: resolved.projectName,
    });
  });
};

export const sourceCatalogFromText = (
  fileName: string,
  text: string,
  options: Partial<SourceCatalogOptions> = {}
): Result<DeclarationCatalog, Diagnostic[]> =>
  sourceCatalogFromTexts(new Map([[fileName, text]]), options);

/**
 * Read source files from disk and build a catalog from them.
 */
export const loadSourceCatalog = (
  filePaths: readonly string[],
  options: Partial<SourceCatalogOptions> = {}
): Result<DeclarationCatalog, Diagnostic[]> => {
  const resolved = resolveSourceCatalogOptions(options);
  const diagnostics: Diagnostic[] = [];
  const sources = new Map<string, string>();

  for (const filePath of filePaths) {
    const absolutePath = path.resolve(filePath);

    if (!fs.existsSync(absolutePath)) {
      diagnostics.push(
        createDiagnostic(
          "SK1001",
          "error",
          `Source file not found: ${absolutePath}`
        )
      );
      continue;
    }

    if (resolved.verbose) {
      console.log(`[Source Catalog] Reading: ${absolutePath}`);
    }

    try {
      sources.set(absolutePath, fs.readFileSync(absolutePath, "utf-8"));
    } catch (err) {
      diagnostics.push(
        createDiagnostic(
          "SK1002",
          "error",
          `Failed to read source file ${absolutePath}: ${err instanceof Error ? err.message : String(err)}`
        )
      );
    }
  }

  if (hasErrors(diagnostics)) {
    return error(diagnostics);
  }

  return sourceCatalogFromTexts(sources, resolved);
};
