/**
 * Member collector - entry points shared by completion and suggestions
 */

export type {
  FilterPolicy,
  FilterPolicyOptions,
  MemberKindSelector,
} from "./policy.js";
export {
  createFilterPolicy,
  defaultFilterPolicyOptions,
  termPolicy,
  typePolicy,
} from "./policy.js";
export { kindMatches } from "./kind.js";
export { includeEntity } from "./filter.js";
export type { MemberCollector } from "./collector.js";
export {
  collectSymbols,
  collectDenotations,
  createMemberCollector,
} from "./collector.js";
export { isValidMember } from "./validity.js";
