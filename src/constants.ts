import type { ComparisonOperator, Connective } from './edm/types.js';

export type WeightTable<K extends string> = Readonly<Partial<Record<K, number>>>;

export const LOGICAL_OPERATORS: WeightTable<Connective> = { and: 0.5, or: 0.5 };
export const BOOLEAN_OPERATORS: WeightTable<ComparisonOperator> = { eq: 0.5, ne: 0.5 };
export const EQUALITY_OPERATORS: WeightTable<ComparisonOperator> = { eq: 1.0 };
export const INTERVAL_OPERATORS: WeightTable<ComparisonOperator> = { ge: 0.5, le: 0.5 };
export const EXPRESSION_OPERATORS: WeightTable<ComparisonOperator> = {
  eq: 0.3,
  ne: 0.3,
  gt: 0.1,
  ge: 0.1,
  lt: 0.1,
  le: 0.1,
};

// Category selection weights for filter functions
export const STRING_FUNC_PROB = 0.7;
export const MATH_FUNC_PROB = 0.15;
export const DATE_FUNC_PROB = 0.15;

/** Probability that a predicate uses a function call instead of a bare property. */
export const FUNCTION_WEIGHT = 0.3;
export const RECURSION_LIMIT = 3;

export const MAX_STRING_LENGTH = 100;
export const DEFAULT_DECIMAL_PRECISION = 16;
export const DEFAULT_DECIMAL_SCALE = 3;

export const MAX_TOP = 1000;
export const MAX_SKIP = 1000;
export const SEARCH_TERM_MAX_LENGTH = 10;
