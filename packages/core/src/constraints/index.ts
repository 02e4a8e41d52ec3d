export type { Comparable } from './comparable.js';
export {
  compareValues,
  constrainValue,
  constrainValueDomains,
  constrainValueLowerBound,
  constrainValueUpperBound,
} from './comparable.js';
export {
  allowValues,
  constrainStringLength,
  constrainStringLengthLowerBound,
  constrainStringLengthUpperBound,
  constrainStringWithRegexExact,
  forbidSubstrings,
} from './strings.js';
export { constrainDigits, fractionalDigits } from './numeric.js';
export { constrainDateTimeFormat } from './dates.js';
export type { Countable } from './collections.js';
export {
  constrainCollectionCount,
  constrainCollectionCountLowerBound,
  constrainCollectionCountUpperBound,
  countOf,
} from './collections.js';
export type { ApplySchemaOptions } from './structural.js';
export { applyConstraintsToEach, applySchema } from './structural.js';
export { matchAny } from './meta.js';
