/**
 * Member filter - applies a FilterPolicy to one declared entity
 */

import type { DeclaredEntity, MemberTypeSystem } from "../universe/types.js";
import { isNoType, lacksFlag } from "../universe/types.js";
import type { FilterPolicy } from "./policy.js";
import { kindMatches } from "./kind.js";

/**
 * All five checks must hold. Flag checks fail when flags are undetermined;
 * the accessibility oracle runs last and its exceptions propagate.
 */
export const includeEntity = (
  entity: DeclaredEntity,
  policy: FilterPolicy,
  typeSystem: MemberTypeSystem
): boolean =>
  kindMatches(entity, policy.memberKind === "type", policy.isApplied) &&
  (policy.includeConstructors || lacksFlag(entity, "constructor")) &&
  (policy.includeSynthetic || lacksFlag(entity, "synthetic")) &&
  (policy.includePrivate || lacksFlag(entity, "private")) &&
  (isNoType(policy.site) ||
    !policy.checkAccessibility ||
    typeSystem.isAccessibleFrom(entity, policy.site));
