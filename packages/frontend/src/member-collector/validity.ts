/**
 * Re-validate one known occurrence without walking the hierarchy again.
 *
 * Stricter than includeEntity: synthetic and private members are always
 * rejected, and isApplied is fixed to false.
 */

import type {
  MemberOccurrence,
  MemberTypeSystem,
  SemanticType,
} from "../universe/types.js";
import { lacksFlag } from "../universe/types.js";
import { kindMatches } from "./kind.js";

export const isValidMember = (
  typeSystem: MemberTypeSystem,
  occurrence: MemberOccurrence,
  wantType: boolean,
  site: SemanticType,
  checkAccessibility: boolean
): boolean => {
  const entity = occurrence.entity;
  return (
    typeSystem.exists(entity) &&
    lacksFlag(entity, "constructor") &&
    lacksFlag(entity, "synthetic") &&
    lacksFlag(entity, "private") &&
    (!checkAccessibility || typeSystem.isAccessibleFrom(entity, site)) &&
    kindMatches(entity, wantType, false)
  );
};
