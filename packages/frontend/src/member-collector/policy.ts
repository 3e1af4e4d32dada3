/**
 * Filter policy - which declared members a collection keeps
 */

import type { SemanticType } from "../universe/types.js";
import { noType } from "../universe/types.js";

export type MemberKindSelector = "term" | "type";

export type FilterPolicy = {
  readonly memberKind: MemberKindSelector;
  /** The access is followed by an argument list, so classes act as constructor proxies */
  readonly isApplied: boolean;
  readonly includePrivate: boolean;
  readonly includeSynthetic: boolean;
  readonly includeConstructors: boolean;
  readonly checkAccessibility: boolean;
  /** Call-site type for accessibility checks; noType disables them */
  readonly site: SemanticType;
};

export type FilterPolicyOptions = Partial<Omit<FilterPolicy, "memberKind">> & {
  readonly memberKind: MemberKindSelector;
};

export const defaultFilterPolicyOptions: Omit<FilterPolicy, "memberKind"> = {
  isApplied: false,
  includePrivate: false,
  includeSynthetic: false,
  includeConstructors: false,
  checkAccessibility: false,
  site: noType,
};

export const createFilterPolicy = (
  options: FilterPolicyOptions
): FilterPolicy =>
  Object.freeze({
    memberKind: options.memberKind,
    isApplied: options.isApplied ?? defaultFilterPolicyOptions.isApplied,
    includePrivate:
      options.includePrivate ?? defaultFilterPolicyOptions.includePrivate,
    includeSynthetic:
      options.includeSynthetic ?? defaultFilterPolicyOptions.includeSynthetic,
    includeConstructors:
      options.includeConstructors ??
      defaultFilterPolicyOptions.includeConstructors,
    checkAccessibility:
      options.checkAccessibility ??
      defaultFilterPolicyOptions.checkAccessibility,
    site: options.site ?? defaultFilterPolicyOptions.site,
  });

export const termPolicy = (
  overrides: Partial<Omit<FilterPolicy, "memberKind">> = {}
): FilterPolicy => createFilterPolicy({ ...overrides, memberKind: "term" });

export const typePolicy = (
  overrides: Partial<Omit<FilterPolicy, "memberKind">> = {}
): FilterPolicy => createFilterPolicy({ ...overrides, memberKind: "type" });
