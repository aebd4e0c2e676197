import type { WeightTable } from '../constants.js';

export const EDM_TYPE_NAMES = [
  'Edm.String',
  'Edm.Int16',
  'Edm.Int32',
  'Edm.Int64',
  'Edm.Byte',
  'Edm.SByte',
  'Edm.Single',
  'Edm.Double',
  'Edm.Decimal',
  'Edm.Boolean',
  'Edm.Guid',
  'Edm.DateTime',
  'Edm.DateTimeOffset',
  'Edm.Time',
  'Edm.Binary',
] as const;

/** Closed set of primitive types a literal can be generated for. */
export type EdmTypeName = (typeof EDM_TYPE_NAMES)[number];

export function isEdmTypeName(name: string): name is EdmTypeName {
  return EDM_TYPE_NAMES.some((typeName) => typeName === name);
}

export type ComparisonOperator = 'eq' | 'ne' | 'gt' | 'ge' | 'lt' | 'le';
export type Connective = 'and' | 'or';

export type OperatorTable = WeightTable<ComparisonOperator>;

/**
 * Per-property literal generation, mutation and operator selection.
 */
export interface PropertyCapability {
  /** A fresh literal in the property's URI literal syntax. */
  generate(): string;
  mutate(literal: string): string;
  /** Weighted comparison operators usable with this operand. */
  operators(): OperatorTable;
}

export interface FilterProperty extends PropertyCapability {
  readonly name: string;
  readonly type: EdmTypeName;
}
