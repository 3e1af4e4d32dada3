/**
 * Catalog-backed MemberTypeSystem
 *
 * Answers the collector's questions (widening, linearization, declarations,
 * overload alternatives, accessibility, existence) from a DeclarationCatalog
 * alone.
 */

import type { DeclarationCatalog } from "./catalog.js";
import type {
  ClassId,
  DeclaredEntity,
  MemberOccurrence,
  MemberTypeSystem,
  SemanticType,
} from "./types.js";
import { hasFlag } from "./types.js";

const widenType = (type: SemanticType): SemanticType => {
  switch (type.kind) {
    case "singletonType":
      return widenType(type.underlying);
    case "refinedType":
      return widenType(type.parent);
    case "nominalType":
    case "noType":
      return type;
  }
};

/**
 * Build a MemberTypeSystem over one catalog snapshot.
 *
 * Linearizations are memoised per class. The cache is private and only ever
 * filled with the same value for the same key.
 */
export const createMemberTypeSystem = (
  catalog: DeclarationCatalog
): MemberTypeSystem => {
  // Key: class stableId
  const linearizationCache = new Map<string, readonly ClassId[]>();
  const onWalk = new Set<string>();

  /**
   * L(C) = C, L(Pn) ⊕ ... ⊕ L(P1), where the right operand keeps an element
   * both sides contain. Heritage order is extends edges, then implements.
   */
  const linearize = (stableId: string): readonly ClassId[] => {
    const cached = linearizationCache.get(stableId);
    if (cached) return cached;

    const entry = catalog.getByStableId(stableId);
    if (!entry || onWalk.has(stableId)) return [];

    onWalk.add(stableId);
    let inherited: readonly ClassId[] = [];
    for (const edge of entry.heritage) {
      const parent = linearize(edge.targetStableId);
      const present = new Set(inherited.map((c) => c.stableId));
      inherited = [
        ...parent.filter((c) => !present.has(c.stableId)),
        ...inherited,
      ];
    }
    onWalk.delete(stableId);

    const result = [
      entry.classId,
      ...inherited.filter((c) => c.stableId !== stableId),
    ];
    linearizationCache.set(stableId, result);
    return result;
  };

  const baseClasses = (type: SemanticType): readonly ClassId[] => {
    const widened = widenType(type);
    if (widened.kind !== "nominalType") return [];
    return linearize(widened.classId.stableId);
  };

  const alternatives = (
    entity: DeclaredEntity,
    prefix: SemanticType
  ): readonly MemberOccurrence[] =>
    entity.signatures.map((signature) => ({
      entity,
      declaringClass: entity.owner,
      signature,
      prefix,
    }));

  const isAccessibleFrom = (
    entity: DeclaredEntity,
    site: SemanticType
  ): boolean => {
    if (entity.flags === undefined) return false;

    const isPrivate = hasFlag(entity, "private");
    const isProtected = hasFlag(entity, "protected");
    if (!isPrivate && !isProtected) return true;

    const widened = widenType(site);
    if (widened.kind !== "nominalType") return false;

    if (isPrivate) {
      return widened.classId.stableId === entity.owner.stableId;
    }

    return baseClasses(widened).some(
      (c) => c.stableId === entity.owner.stableId
    );
  };

  const exists = (entity: DeclaredEntity): boolean =>
    catalog
      .getByStableId(entity.owner.stableId)
      ?.declarations.includes(entity) ?? false;

  return {
    widen: widenType,
    baseClasses,
    declarations: (classId) => catalog.getDeclarations(classId),
    alternatives,
    isAccessibleFrom,
    exists,
  };
};
