/**
 * Class declaration extraction from TypeScript syntax
 *
 * Reads class, interface and namespace declarations straight from the AST
 * (no type checker) and produces ClassDeclarations for the catalog.
 *
 * Mapping:
 * - class / interface            → class entry; heritage by simple name
 * - property, accessor           → term (get/set share one entity)
 * - method, function             → term, one signature per overload
 * - constructor                  → term "constructor" with the constructor flag
 * - constructor parameter property → synthetic term
 * - static member                → skipped; not a member of instances
 * - companion namespace members  → type (type alias, interface, enum),
 *                                  class (class), module class (namespace),
 *                                  term (variable, function)
 * - namespace without companion  → module class entry
 */

import ts from "typescript";
import type { SourceLocation } from "../types/diagnostic.js";
import type {
  ClassDeclaration,
  MemberDeclaration,
} from "../universe/catalog.js";
import type { ClassKind, EntityFlag, EntityKind } from "../universe/types.js";
import { getNodeLocation } from "./diagnostics.js";

type MemberDraft = {
  readonly name: string;
  readonly kind: EntityKind;
  readonly flags: Set<EntityFlag>;
  /** Signatures without a body: overloads, signatures, fields */
  readonly declared: string[];
  /** Bodies, used only when nothing was declared separately */
  readonly implementations: string[];
};

type ClassDraft = {
  readonly name: string;
  kind: ClassKind;
  readonly extends: string[];
  readonly implements: string[];
  readonly members: Map<string, MemberDraft>;
  readonly location: SourceLocation;
};

const hasModifier = (node: ts.Node, kind: ts.SyntaxKind): boolean =>
  ts.canHaveModifiers(node)
    ? (ts.getModifiers(node)?.some((m) => m.kind === kind) ?? false)
    : false;

const getMemberName = (name: ts.PropertyName, sf: ts.SourceFile): string => {
  if (
    ts.isIdentifier(name) ||
    ts.isPrivateIdentifier(name) ||
    ts.isStringLiteral(name) ||
    ts.isNumericLiteral(name)
  ) {
    return name.text;
  }
  return name.getText(sf);
};

const getAccessFlags = (
  node: ts.Node,
  name?: ts.PropertyName
): readonly EntityFlag[] => {
  if (
    hasModifier(node, ts.SyntaxKind.PrivateKeyword) ||
    (name !== undefined && ts.isPrivateIdentifier(name))
  ) {
    return ["private"];
  }
  if (hasModifier(node, ts.SyntaxKind.ProtectedKeyword)) {
    return ["protected"];
  }
  return [];
};

const typeSuffix = (
  type: ts.TypeNode | undefined,
  sf: ts.SourceFile
): string => (type ? `: ${type.getText(sf)}` : "");

const parametersText = (
  parameters: ts.NodeArray<ts.ParameterDeclaration>,
  sf: ts.SourceFile
): string => parameters.map((p) => p.getText(sf)).join(", ");

const typeParametersText = (
  typeParameters: ts.NodeArray<ts.TypeParameterDeclaration> | undefined,
  sf: ts.SourceFile
): string =>
  typeParameters && typeParameters.length > 0
    ? `<${typeParameters.map((p) => p.getText(sf)).join(", ")}>`
    : "";

const getHeritageName = (
  type: ts.ExpressionWithTypeArguments,
  sf: ts.SourceFile
): string =>
  ts.isIdentifier(type.expression)
    ? type.expression.text
    : type.expression.getText(sf);

const addMember = (
  draft: ClassDraft,
  name: string,
  kind: EntityKind,
  flags: readonly EntityFlag[],
  signature: string,
  isImplementation: boolean
): void => {
  const key = `${kind}:${name}`;
  const existing = draft.members.get(key);
  const member: MemberDraft = existing ?? {
    name,
    kind,
    flags: new Set(),
    declared: [],
    implementations: [],
  };
  for (const flag of flags) {
    member.flags.add(flag);
  }
  if (isImplementation) {
    member.implementations.push(signature);
  } else {
    member.declared.push(signature);
  }
  if (!existing) {
    draft.members.set(key, member);
  }
};

const addHeritage = (
  draft: ClassDraft,
  clauses: ts.NodeArray<ts.HeritageClause> | undefined,
  isInterface: boolean,
  sf: ts.SourceFile
): void => {
  for (const clause of clauses ?? []) {
    const names = clause.types.map((t) => getHeritageName(t, sf));
    if (clause.token === ts.SyntaxKind.ExtendsKeyword || isInterface) {
      draft.extends.push(...names);
    } else {
      draft.implements.push(...names);
    }
  }
};

const addClassElement = (
  draft: ClassDraft,
  member: ts.ClassElement | ts.TypeElement,
  sf: ts.SourceFile
): void => {
  if (hasModifier(member, ts.SyntaxKind.StaticKeyword)) return;

  if (ts.isPropertyDeclaration(member) || ts.isPropertySignature(member)) {
    const name = getMemberName(member.name, sf);
    const optional = member.questionToken ? "?" : "";
    addMember(
      draft,
      name,
      "term",
      getAccessFlags(member, member.name),
      `${name}${optional}${typeSuffix(member.type, sf)}`,
      false
    );
    return;
  }

  if (ts.isMethodDeclaration(member) || ts.isMethodSignature(member)) {
    const name = getMemberName(member.name, sf);
    const signature =
      `${name}${typeParametersText(member.typeParameters, sf)}` +
      `(${parametersText(member.parameters, sf)})${typeSuffix(member.type, sf)}`;
    addMember(
      draft,
      name,
      "term",
      getAccessFlags(member, member.name),
      signature,
      ts.isMethodDeclaration(member) && member.body !== undefined
    );
    return;
  }

  if (ts.isGetAccessorDeclaration(member)) {
    const name = getMemberName(member.name, sf);
    addMember(
      draft,
      name,
      "term",
      getAccessFlags(member, member.name),
      `get ${name}()${typeSuffix(member.type, sf)}`,
      false
    );
    return;
  }

  if (ts.isSetAccessorDeclaration(member)) {
    const name = getMemberName(member.name, sf);
    addMember(
      draft,
      name,
      "term",
      getAccessFlags(member, member.name),
      `set ${name}(${parametersText(member.parameters, sf)})`,
      false
    );
    return;
  }

  if (ts.isConstructorDeclaration(member)) {
    addMember(
      draft,
      "constructor",
      "term",
      [...getAccessFlags(member), "constructor"],
      `constructor(${parametersText(member.parameters, sf)})`,
      member.body !== undefined
    );

    for (const parameter of member.parameters) {
      if (!ts.isParameterPropertyDeclaration(parameter, member)) continue;
      const name = parameter.name.getText(sf);
      addMember(
        draft,
        name,
        "term",
        [...getAccessFlags(parameter), "synthetic"],
        `${name}${typeSuffix(parameter.type, sf)}`,
        false
      );
    }
  }
};

const addNamespaceMembers = (
  draft: ClassDraft,
  namespace: ts.ModuleDeclaration,
  sf: ts.SourceFile
): void => {
  const body = namespace.body;
  if (!body) return;

  // namespace A.B { ... } nests B as a module
  if (ts.isModuleDeclaration(body)) {
    addMember(
      draft,
      body.name.text,
      "class",
      ["module"],
      `namespace ${body.name.text}`,
      false
    );
    return;
  }
  if (!ts.isModuleBlock(body)) return;

  for (const statement of body.statements) {
    const flags: readonly EntityFlag[] = hasModifier(
      statement,
      ts.SyntaxKind.ExportKeyword
    )
      ? []
      : ["private"];

    if (ts.isTypeAliasDeclaration(statement)) {
      const name = statement.name.text;
      addMember(
        draft,
        name,
        "type",
        flags,
        `type ${name}${typeParametersText(statement.typeParameters, sf)} = ${statement.type.getText(sf)}`,
        false
      );
    } else if (ts.isInterfaceDeclaration(statement)) {
      const name = statement.name.text;
      addMember(
        draft,
        name,
        "type",
        flags,
        `interface ${name}${typeParametersText(statement.typeParameters, sf)}`,
        false
      );
    } else if (ts.isEnumDeclaration(statement)) {
      addMember(
        draft,
        statement.name.text,
        "type",
        flags,
        `enum ${statement.name.text}`,
        false
      );
    } else if (ts.isClassDeclaration(statement) && statement.name) {
      const name = statement.name.text;
      addMember(
        draft,
        name,
        "class",
        flags,
        `class ${name}${typeParametersText(statement.typeParameters, sf)}`,
        false
      );
    } else if (
      ts.isModuleDeclaration(statement) &&
      ts.isIdentifier(statement.name)
    ) {
      addMember(
        draft,
        statement.name.text,
        "class",
        [...flags, "module"],
        `namespace ${statement.name.text}`,
        false
      );
    } else if (ts.isFunctionDeclaration(statement) && statement.name) {
      const name = statement.name.text;
      addMember(
        draft,
        name,
        "term",
        flags,
        `function ${name}${typeParametersText(statement.typeParameters, sf)}` +
          `(${parametersText(statement.parameters, sf)})${typeSuffix(statement.type, sf)}`,
        statement.body !== undefined
      );
    } else if (ts.isVariableStatement(statement)) {
      for (const declaration of statement.declarationList.declarations) {
        if (!ts.isIdentifier(declaration.name)) continue;
        const name = declaration.name.text;
        addMember(
          draft,
          name,
          "term",
          flags,
          `${name}${typeSuffix(declaration.type, sf)}`,
          false
        );
      }
    }
  }
};

const toDeclaration = (draft: ClassDraft): ClassDeclaration => ({
  name: draft.name,
  kind: draft.kind,
  extends: draft.extends,
  implements: draft.implements,
  location: draft.location,
  members: [...draft.members.values()].map(
    (member): MemberDeclaration => ({
      name: member.name,
      kind: member.kind,
      flags: [...member.flags],
      signatures:
        member.declared.length > 0 ? member.declared : member.implementations,
    })
  ),
});

/**
 * Extract class-like declarations from parsed source files.
 *
 * Interfaces merge into a class or interface of the same name, and a
 * namespace merges into it as a companion. Two classes with one name stay
 * separate so the catalog can report the duplicate.
 */
export const extractClassDeclarations = (
  sourceFiles: readonly ts.SourceFile[]
): readonly ClassDeclaration[] => {
  const drafts: ClassDraft[] = [];
  const byName = new Map<string, ClassDraft>();

  const createDraft = (
    name: string,
    kind: ClassKind,
    location: SourceLocation
  ): ClassDraft => {
    const draft: ClassDraft = {
      name,
      kind,
      extends: [],
      implements: [],
      members: new Map(),
      location,
    };
    drafts.push(draft);
    if (!byName.has(name)) {
      byName.set(name, draft);
    }
    return draft;
  };

  for (const sf of sourceFiles) {
    for (const statement of sf.statements) {
      if (ts.isClassDeclaration(statement) && statement.name) {
        const name = statement.name.text;
        const existing = byName.get(name);
        const location = getNodeLocation(sf, statement.name);
        const draft =
          existing && existing.kind === "interface"
            ? existing
            : createDraft(name, "class", location);
        draft.kind = "class";
        addHeritage(draft, statement.heritageClauses, false, sf);
        for (const member of statement.members) {
          addClassElement(draft, member, sf);
        }
      } else if (ts.isInterfaceDeclaration(statement)) {
        const name = statement.name.text;
        const draft =
          byName.get(name) ??
          createDraft(name, "interface", getNodeLocation(sf, statement.name));
        addHeritage(draft, statement.heritageClauses, true, sf);
        for (const member of statement.members) {
          addClassElement(draft, member, sf);
        }
      }
    }
  }

  for (const sf of sourceFiles) {
    for (const statement of sf.statements) {
      if (
        !ts.isModuleDeclaration(statement) ||
        !ts.isIdentifier(statement.name)
      ) {
        continue;
      }
      const name = statement.name.text;
      const draft =
        byName.get(name) ??
        createDraft(name, "module", getNodeLocation(sf, statement.name));
      addNamespaceMembers(draft, statement, sf);
    }
  }

  return drafts.map(toDeclaration);
};
