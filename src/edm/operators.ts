import {
  BOOLEAN_OPERATORS,
  EQUALITY_OPERATORS,
  EXPRESSION_OPERATORS,
  INTERVAL_OPERATORS,
} from '../constants.js';
import { type RandomSource, choice } from '../random.js';
import type { FilterRestrictionKind } from '../schema/types.js';
import type { EdmTypeName, OperatorTable } from './types.js';

/**
 * Operator table for a property. The restriction kind wins over the type:
 * single/multi-value properties only take `eq`, interval properties take
 * either the interval bounds or `eq`, drawn again on every call.
 */
export function operatorTableFor(
  type: EdmTypeName,
  restriction: FilterRestrictionKind | undefined,
  random: RandomSource,
): OperatorTable {
  if (restriction === 'single-value' || restriction === 'multi-value') {
    return EQUALITY_OPERATORS;
  }
  if (restriction === 'interval') {
    return choice(random, [INTERVAL_OPERATORS, EQUALITY_OPERATORS]);
  }
  if (type === 'Edm.Boolean') {
    return BOOLEAN_OPERATORS;
  }
  return EXPRESSION_OPERATORS;
}
