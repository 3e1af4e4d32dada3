/**
 * Kind matching for member queries
 */

import type { DeclaredEntity } from "../universe/types.js";
import { lacksFlag } from "../universe/types.js";

/**
 * Does the entity's kind fit what the query looks for?
 *
 * A class is not a value, but when it is followed by an argument list it
 * stands for its constructor proxy. Those proxies are not stored as separate
 * members, so applied term queries accept non-module classes directly.
 */
export const kindMatches = (
  entity: DeclaredEntity,
  wantType: boolean,
  isApplied: boolean
): boolean => {
  switch (entity.kind) {
    case "type":
      return wantType;
    case "term":
      return !wantType;
    case "class":
      return !wantType && isApplied && lacksFlag(entity, "module");
  }
};
