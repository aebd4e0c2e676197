import type { EdmTypeName, FilterProperty, OperatorTable } from '../src/edm/types.js';
import type { RandomSource } from '../src/random.js';

/**
 * Random source that replays the given values in order and fails loudly
 * once they run out, so a test notices any extra draw.
 */
export function scriptedRandom(values: readonly number[]): RandomSource & { readonly remaining: number } {
  let index = 0;
  return {
    next(): number {
      const value = values[index];
      if (value === undefined) {
        throw new Error(`scripted random exhausted after ${values.length} values`);
      }
      index += 1;
      return value;
    },
    get remaining(): number {
      return values.length - index;
    },
  };
}

/** Property whose literal and operators never change. */
export function fixedProperty(
  name: string,
  type: EdmTypeName = 'Edm.Int32',
  literal = '1',
  operators: OperatorTable = { eq: 1 },
): FilterProperty {
  return {
    name,
    type,
    generate: () => literal,
    mutate: (value) => value,
    operators: () => operators,
  };
}

/** Deepest parenthesis nesting in a string. */
export function maxParenDepth(text: string): number {
  let depth = 0;
  let max = 0;
  for (const char of text) {
    if (char === '(') {
      depth += 1;
      max = Math.max(max, depth);
    } else if (char === ')') {
      depth -= 1;
      if (depth < 0) return -1;
    }
  }
  return depth === 0 ? max : -1;
}
