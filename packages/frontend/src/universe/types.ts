/**
 * Semantic Model Type Definitions
 *
 * Shapes shared by the declaration catalog, the catalog-backed type system
 * and the member collector. Everything here is read-only data owned by the
 * type system; the collector only reads it.
 *
 * Key Types:
 * - ClassId: Canonical identity for a class, interface or module
 * - DeclaredEntity: A member declaration owned by exactly one class
 * - MemberOccurrence: One signature of an entity as seen through a prefix type
 * - SemanticType: The types a member query can be asked about
 * - MemberTypeSystem: The collaborator API the collector consumes
 */

// ═══════════════════════════════════════════════════════════════════════════
// CLASS IDENTITY
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Canonical identity for a class-like declaration.
 *
 * stableId is "{projectName}:{name}", e.g. "shapes:Circle".
 */
export type ClassId = {
  readonly stableId: string;
  readonly name: string;
};

export type ClassKind = "class" | "interface" | "module";

export type HeritageEdge = {
  /** "extends" for superclasses, "implements" for interfaces */
  readonly kind: "extends" | "implements";
  readonly targetStableId: string;
};

// ═══════════════════════════════════════════════════════════════════════════
// DECLARED ENTITIES
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Closed classification of a declared member.
 *
 * "class" is a class declaration nested in its owner. Whether it is a module
 * singleton is the orthogonal "module" flag.
 */
export type EntityKind = "term" | "type" | "class";

export type EntityFlag =
  | "synthetic"
  | "private"
  | "protected"
  | "constructor"
  | "module";

/**
 * One signature alternative of an entity. Overloaded members carry several.
 */
export type SignatureEntry = {
  readonly stableId: string;
  /** Display text, e.g. "area(scale: number): number" */
  readonly text: string;
};

/**
 * A named member declaration.
 *
 * Identity is object identity: two entities with equal fields are still
 * different declarations.
 */
export type DeclaredEntity = {
  /** "{owner stableId}#{name}" */
  readonly stableId: string;
  readonly name: string;
  readonly kind: EntityKind;
  /** undefined when the declaration's flags could not be determined */
  readonly flags: ReadonlySet<EntityFlag> | undefined;
  readonly owner: ClassId;
  readonly signatures: readonly SignatureEntry[];
};

/**
 * One concrete signature binding of an entity, as seen through the widened
 * type that was queried. Produced fresh by every call.
 */
export type MemberOccurrence = {
  readonly entity: DeclaredEntity;
  readonly declaringClass: ClassId;
  readonly signature: SignatureEntry;
  readonly prefix: SemanticType;
};

// ═══════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════

export type NominalType = {
  readonly kind: "nominalType";
  readonly classId: ClassId;
};

/** The type of exactly one value, e.g. `this` or a stable path */
export type SingletonType = {
  readonly kind: "singletonType";
  readonly name: string;
  readonly underlying: SemanticType;
};

/** A parent type narrowed by extra member constraints */
export type RefinedType = {
  readonly kind: "refinedType";
  readonly parent: SemanticType;
  readonly refinedNames: readonly string[];
};

export type NoType = {
  readonly kind: "noType";
};

export type SemanticType = NominalType | SingletonType | RefinedType | NoType;

/** Shared "no type" sentinel */
export const noType: NoType = Object.freeze({ kind: "noType" });

export const nominalType = (classId: ClassId): NominalType => ({
  kind: "nominalType",
  classId,
});

export const singletonType = (
  name: string,
  underlying: SemanticType
): SingletonType => ({
  kind: "singletonType",
  name,
  underlying,
});

export const refinedType = (
  parent: SemanticType,
  refinedNames: readonly string[]
): RefinedType => ({
  kind: "refinedType",
  parent,
  refinedNames,
});

export const isNoType = (type: SemanticType): type is NoType =>
  type === noType || type.kind === "noType";

// ═══════════════════════════════════════════════════════════════════════════
// COLLABORATOR API
// ═══════════════════════════════════════════════════════════════════════════

/**
 * What the member collector needs from a type system.
 *
 * Passed explicitly to every collector operation; there is no ambient
 * analysis context.
 */
export type MemberTypeSystem = {
  /** Reduce a type to the nominal upper bound it represents */
  readonly widen: (type: SemanticType) => SemanticType;
  /**
   * Linearized, duplicate-free base classes, most derived first.
   * Empty for noType and for types the system does not know.
   */
  readonly baseClasses: (type: SemanticType) => readonly ClassId[];
  /** Entities declared directly in a class, in declaration order */
  readonly declarations: (classId: ClassId) => readonly DeclaredEntity[];
  /** Every signature alternative of an entity seen through `prefix` */
  readonly alternatives: (
    entity: DeclaredEntity,
    prefix: SemanticType
  ) => readonly MemberOccurrence[];
  readonly isAccessibleFrom: (
    entity: DeclaredEntity,
    site: SemanticType
  ) => boolean;
  /** False once a recompilation has replaced the entity's declaration */
  readonly exists: (entity: DeclaredEntity) => boolean;
};

// ═══════════════════════════════════════════════════════════════════════════
// FLAG HELPERS
// ═══════════════════════════════════════════════════════════════════════════

/**
 * True only when the entity's flags are known and do not include `flag`.
 */
export const lacksFlag = (entity: DeclaredEntity, flag: EntityFlag): boolean =>
  entity.flags !== undefined && !entity.flags.has(flag);

/**
 * True only when the entity's flags are known and include `flag`.
 */
export const hasFlag = (entity: DeclaredEntity, flag: EntityFlag): boolean =>
  entity.flags !== undefined && entity.flags.has(flag);
