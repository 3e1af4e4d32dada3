/**
 * Conversion of TypeScript syntax diagnostics
 */

import ts from "typescript";
import type { Diagnostic, SourceLocation } from "../types/diagnostic.js";
import { createDiagnostic } from "../types/diagnostic.js";

/**
 * 1-based line and column of a position in a source file
 */
export const getSourceLocation = (
  file: ts.SourceFile,
  start: number,
  length: number
): SourceLocation => {
  const { line, character } = file.getLineAndCharacterOfPosition(start);
  return {
    file: file.fileName,
    line: line + 1,
    column: character + 1,
    length,
  };
};

export const getNodeLocation = (
  file: ts.SourceFile,
  node: ts.Node
): SourceLocation => {
  const start = node.getStart(file);
  return getSourceLocation(file, start, node.getEnd() - start);
};

export const convertSyntaxDiagnostic = (tsDiag: ts.Diagnostic): Diagnostic => {
  const severity =
    tsDiag.category === ts.DiagnosticCategory.Error
      ? "error"
      : tsDiag.category === ts.DiagnosticCategory.Warning
        ? "warning"
        : "info";

  const location =
    tsDiag.file && tsDiag.start !== undefined
      ? getSourceLocation(tsDiag.file, tsDiag.start, tsDiag.length ?? 1)
      : undefined;

  return createDiagnostic(
    "SK1003",
    severity,
    ts.flattenDiagnosticMessageText(tsDiag.messageText, "\n"),
    location
  );
};
