import { BOOLEAN_OPERATORS, EXPRESSION_OPERATORS } from '../constants.js';
import { generateBoolean, generateInt32, generateString } from '../edm/generators.js';
import type { OperatorTable } from '../edm/types.js';
import type { RandomSource } from '../random.js';

const RETURNED_STRING_MAX_LENGTH = 10;

export type FunctionReturnTypeName = 'Edm.Int32' | 'Edm.String' | 'Edm.Boolean';

/**
 * What a filter function evaluates to: decides which operators may follow
 * the call and what literal it is compared against.
 */
export interface FunctionReturnType {
  readonly type: FunctionReturnTypeName;
  readonly operators: OperatorTable;
  generate(): string;
}

export function intReturn(random: RandomSource): FunctionReturnType {
  return {
    type: 'Edm.Int32',
    operators: EXPRESSION_OPERATORS,
    generate: () => generateInt32(random),
  };
}

export function stringReturn(random: RandomSource): FunctionReturnType {
  return {
    type: 'Edm.String',
    operators: EXPRESSION_OPERATORS,
    generate: () => generateString(random, RETURNED_STRING_MAX_LENGTH),
  };
}

export function booleanReturn(random: RandomSource): FunctionReturnType {
  return {
    type: 'Edm.Boolean',
    operators: BOOLEAN_OPERATORS,
    generate: () => generateBoolean(random),
  };
}
