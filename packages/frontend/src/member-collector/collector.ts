/**
 * Member collector
 *
 * Walks the linearized base classes of a widened type and keeps the declared
 * members a FilterPolicy admits. Two result shapes:
 *
 * - collectSymbols: identity set of entities, for name suggestions
 * - collectDenotations: every signature occurrence in traversal order, for
 *   completion items
 */

import type {
  DeclaredEntity,
  MemberOccurrence,
  MemberTypeSystem,
  SemanticType,
} from "../universe/types.js";
import type { FilterPolicy } from "./policy.js";
import { includeEntity } from "./filter.js";
import { isValidMember } from "./validity.js";

/**
 * Collect the entities visible on `type` as a set.
 *
 * Iteration order is first-seen order: most derived class first, then
 * declaration order.
 */
export const collectSymbols = (
  typeSystem: MemberTypeSystem,
  type: SemanticType,
  policy: FilterPolicy
): ReadonlySet<DeclaredEntity> => {
  const result = new Set<DeclaredEntity>();
  const widened = typeSystem.widen(type);

  for (const baseClass of typeSystem.baseClasses(widened)) {
    for (const entity of typeSystem.declarations(baseClass)) {
      if (includeEntity(entity, policy, typeSystem)) {
        result.add(entity);
      }
    }
  }

  return result;
};

/**
 * Collect every signature occurrence visible on `type`.
 *
 * No deduplication across base classes: an entity reachable through two
 * classes contributes its occurrences twice.
 */
export const collectDenotations = (
  typeSystem: MemberTypeSystem,
  type: SemanticType,
  policy: FilterPolicy
): readonly MemberOccurrence[] => {
  const result: MemberOccurrence[] = [];
  const widened = typeSystem.widen(type);

  for (const baseClass of typeSystem.baseClasses(widened)) {
    for (const entity of typeSystem.declarations(baseClass)) {
      if (includeEntity(entity, policy, typeSystem)) {
        result.push(...typeSystem.alternatives(entity, widened));
      }
    }
  }

  return result;
};

export type MemberCollector = {
  readonly collectSymbols: (
    type: SemanticType,
    policy: FilterPolicy
  ) => ReadonlySet<DeclaredEntity>;
  readonly collectDenotations: (
    type: SemanticType,
    policy: FilterPolicy
  ) => readonly MemberOccurrence[];
  readonly isValidMember: (
    occurrence: MemberOccurrence,
    wantType: boolean,
    site: SemanticType,
    checkAccessibility: boolean
  ) => boolean;
};

/**
 * Bind the collector operations to one analysis context.
 */
export const createMemberCollector = (
  typeSystem: MemberTypeSystem
): MemberCollector => ({
  collectSymbols: (type, policy) => collectSymbols(typeSystem, type, policy),
  collectDenotations: (type, policy) =>
    collectDenotations(typeSystem, type, policy),
  isValidMember: (occurrence, wantType, site, checkAccessibility) =>
    isValidMember(typeSystem, occurrence, wantType, site, checkAccessibility),
});
