/**
 * Declaration Catalog
 *
 * Turns plain class declaration data into ClassEntries with stable entity
 * identities. This is the single store every type-system query reads.
 *
 * Entities are created once per build. An update rebuilds only the classes it
 * names, so entities of untouched classes keep their identity while replaced
 * ones stop existing.
 */

import type { Result } from "../types/result.js";
import { ok, error } from "../types/result.js";
import type { Diagnostic, SourceLocation } from "../types/diagnostic.js";
import { createDiagnostic, hasErrors } from "../types/diagnostic.js";
import type {
  ClassId,
  ClassKind,
  DeclaredEntity,
  EntityFlag,
  EntityKind,
  HeritageEdge,
  SignatureEntry,
} from "./types.js";

// ═══════════════════════════════════════════════════════════════════════════
// INPUT SHAPES
// ═══════════════════════════════════════════════════════════════════════════

export type MemberDeclaration = {
  readonly name: string;
  readonly kind: EntityKind;
  readonly flags?: readonly EntityFlag[];
  /** Set when the declaration's flags could not be determined */
  readonly flagsUnresolved?: boolean;
  /** One entry per overload; defaults to the member name */
  readonly signatures?: readonly string[];
};

export type ClassDeclaration = {
  readonly name: string;
  readonly kind?: ClassKind;
  readonly extends?: readonly string[];
  readonly implements?: readonly string[];
  readonly members: readonly MemberDeclaration[];
  readonly location?: SourceLocation;
};

export type CatalogOptions = {
  readonly projectName: string;
};

// ═══════════════════════════════════════════════════════════════════════════
// CATALOG
// ═══════════════════════════════════════════════════════════════════════════

export type ClassEntry = {
  readonly classId: ClassId;
  readonly kind: ClassKind;
  readonly heritage: readonly HeritageEdge[];
  readonly declarations: readonly DeclaredEntity[];
  readonly location?: SourceLocation;
};

export type DeclarationCatalog = {
  readonly projectName: string;
  /** All entries keyed by stableId, in declaration order */
  readonly entries: ReadonlyMap<string, ClassEntry>;
  /** Non-fatal diagnostics produced while building */
  readonly diagnostics: readonly Diagnostic[];
  readonly getByStableId: (stableId: string) => ClassEntry | undefined;
  readonly resolveName: (name: string) => ClassId | undefined;
  readonly getDeclarations: (classId: ClassId) => readonly DeclaredEntity[];
  readonly getHeritage: (classId: ClassId) => readonly HeritageEdge[];
  readonly hasClass: (stableId: string) => boolean;
  readonly getAllClassIds: () => readonly ClassId[];
};

export const makeClassId = (projectName: string, name: string): ClassId => ({
  stableId: `${projectName}:${name}`,
  name,
});

const createEntity = (
  owner: ClassId,
  member: MemberDeclaration
): DeclaredEntity => {
  // a companion may declare a type and a term under one name
  const stableId = `${owner.stableId}#${member.kind}:${member.name}`;
  const texts =
    member.signatures && member.signatures.length > 0
      ? member.signatures
      : [member.name];
  const signatures: SignatureEntry[] = texts.map((text, index) => ({
    stableId: `${stableId}(${index})`,
    text,
  }));

  return {
    stableId,
    name: member.name,
    kind: member.kind,
    flags: member.flagsUnresolved
      ? undefined
      : new Set<EntityFlag>(member.flags ?? []),
    owner,
    signatures,
  };
};

const createEntry = (
  input: ClassDeclaration,
  projectName: string,
  knownNames: ReadonlySet<string>,
  diagnostics: Diagnostic[]
): ClassEntry => {
  const classId = makeClassId(projectName, input.name);
  const heritage: HeritageEdge[] = [];

  const addEdges = (
    kind: HeritageEdge["kind"],
    names: readonly string[] | undefined
  ): void => {
    for (const name of names ?? []) {
      if (!knownNames.has(name)) {
        diagnostics.push(
          createDiagnostic(
            "SK2002",
            "warning",
            `Unresolved heritage target '${name}' in '${input.name}'`,
            input.location,
            "Members inherited from it will not be visible"
          )
        );
        continue;
      }
      heritage.push({
        kind,
        targetStableId: makeClassId(projectName, name).stableId,
      });
    }
  };

  addEdges("extends", input.extends);
  addEdges("implements", input.implements);

  return {
    classId,
    kind: input.kind ?? "class",
    heritage,
    declarations: input.members.map((member) => createEntity(classId, member)),
    location: input.location,
  };
};

/**
 * Report every heritage cycle once, as the path that closes it.
 */
const findHeritageCycles = (
  entries: ReadonlyMap<string, ClassEntry>
): readonly Diagnostic[] => {
  const diagnostics: Diagnostic[] = [];
  const done = new Set<string>();
  const onStack: string[] = [];

  const visit = (stableId: string): void => {
    const entry = entries.get(stableId);
    if (!entry || done.has(stableId)) return;

    const stackIndex = onStack.indexOf(stableId);
    if (stackIndex !== -1) {
      const path = [...onStack.slice(stackIndex), stableId].map(
        (id) => entries.get(id)?.classId.name ?? id
      );
      diagnostics.push(
        createDiagnostic(
          "SK2003",
          "error",
          `Cyclic heritage: ${path.join(" -> ")}`,
          entry.location
        )
      );
      return;
    }

    onStack.push(stableId);
    for (const edge of entry.heritage) {
      visit(edge.targetStableId);
    }
    onStack.pop();
    done.add(stableId);
  };

  for (const stableId of entries.keys()) {
    visit(stableId);
  }

  return diagnostics;
};

const createCatalog = (
  projectName: string,
  entries: ReadonlyMap<string, ClassEntry>,
  diagnostics: readonly Diagnostic[]
): DeclarationCatalog => {
  const byName = new Map<string, ClassId>();
  for (const entry of entries.values()) {
    byName.set(entry.classId.name, entry.classId);
  }

  return {
    projectName,
    entries,
    diagnostics,
    getByStableId: (stableId) => entries.get(stableId),
    resolveName: (name) => byName.get(name),
    getDeclarations: (classId) =>
      entries.get(classId.stableId)?.declarations ?? [],
    getHeritage: (classId) => entries.get(classId.stableId)?.heritage ?? [],
    hasClass: (stableId) => entries.has(stableId),
    getAllClassIds: () => [...entries.values()].map((e) => e.classId),
  };
};

/**
 * Rebuild the given inputs on top of `base` (which may be empty) and check
 * the resulting heritage graph.
 */
const assemble = (
  projectName: string,
  base: ReadonlyMap<string, ClassEntry>,
  inputs: readonly ClassDeclaration[]
): Result<DeclarationCatalog, Diagnostic[]> => {
  const diagnostics: Diagnostic[] = [];

  const seen = new Set<string>();
  for (const input of inputs) {
    if (seen.has(input.name)) {
      diagnostics.push(
        createDiagnostic(
          "SK2001",
          "error",
          `Duplicate class declaration '${input.name}'`,
          input.location
        )
      );
    }
    seen.add(input.name);
  }

  const knownNames = new Set<string>(seen);
  for (const entry of base.values()) {
    knownNames.add(entry.classId.name);
  }

  const entries = new Map(base);
  for (const input of inputs) {
    const entry = createEntry(input, projectName, knownNames, diagnostics);
    entries.set(entry.classId.stableId, entry);
  }

  diagnostics.push(...findHeritageCycles(entries));

  if (hasErrors(diagnostics)) {
    return error(diagnostics);
  }

  return ok(createCatalog(projectName, entries, diagnostics));
};

/**
 * Build a catalog from class declarations.
 */
export const buildDeclarationCatalog = (
  declarations: readonly ClassDeclaration[],
  options: CatalogOptions
): Result<DeclarationCatalog, Diagnostic[]> =>
  assemble(options.projectName, new Map(), declarations);

/**
 * Produce a new catalog in which `declarations` replace (or add) classes of
 * the same name. The original catalog is left untouched.
 */
export const updateDeclarationCatalog = (
  catalog: DeclarationCatalog,
  declarations: readonly ClassDeclaration[]
): Result<DeclarationCatalog, Diagnostic[]> =>
  assemble(catalog.projectName, catalog.entries, declarations);
