import { DATE_FUNC_PROB, MATH_FUNC_PROB, STRING_FUNC_PROB } from '../constants.js';
import { generateByte, generateString } from '../edm/generators.js';
import type { EdmTypeName, FilterProperty } from '../edm/types.js';
import { type RandomSource, choice, coin, weightedChoice } from '../random.js';
import { type FunctionReturnType, booleanReturn, intReturn, stringReturn } from './return-types.js';

const REPLACE_LITERAL_MAX_LENGTH = 5;
const CONCAT_LITERAL_MAX_LENGTH = 20;

export type FunctionCategoryName = 'String' | 'Date' | 'Math';

/**
 * How a category is picked before a function is picked inside it.
 * `weighted` uses the category probabilities, `uniform` ignores them.
 */
export type CategorySelection = 'weighted' | 'uniform';

/** A generated built-in function call usable as the left side of a comparison. */
export interface FilterFunction {
  readonly name: string;
  /** Rendered call, e.g. `startswith(Name, 'ab')`. */
  readonly text: string;
  readonly properties: readonly FilterProperty[];
  readonly params: readonly string[];
  readonly returnType: FunctionReturnType;
}

type FunctionFactory = (properties: readonly FilterProperty[], random: RandomSource) => FilterFunction;

function call(name: string, args: readonly string[]): string {
  return `${name}(${args.join(', ')})`;
}

function unary(name: string, returns: (random: RandomSource) => FunctionReturnType): FunctionFactory {
  return (properties, random) => {
    const property = choice(random, properties);
    return {
      name,
      text: call(name, [property.name]),
      properties: [property],
      params: [],
      returnType: returns(random),
    };
  };
}

/** `name(Property, literal)` with the literal drawn from the property itself. */
function withPropertyLiteral(name: string, returns: (random: RandomSource) => FunctionReturnType): FunctionFactory {
  return (properties, random) => {
    const property = choice(random, properties);
    const value = property.generate();
    return {
      name,
      text: call(name, [property.name, value]),
      properties: [property],
      params: [value],
      returnType: returns(random),
    };
  };
}

const STRING_FUNCTIONS: Readonly<Record<string, FunctionFactory>> = {
  substringof(properties, random) {
    const property = choice(random, properties);
    const value = property.generate();
    return {
      name: 'substringof',
      text: call('substringof', [value, property.name]),
      properties: [property],
      params: [value],
      returnType: booleanReturn(random),
    };
  },
  endswith: withPropertyLiteral('endswith', booleanReturn),
  startswith: withPropertyLiteral('startswith', booleanReturn),
  length: unary('length', intReturn),
  indexof: withPropertyLiteral('indexof', intReturn),
  replace(properties, random) {
    const property = choice(random, properties);
    const find = generateString(random, REPLACE_LITERAL_MAX_LENGTH);
    const replacement = generateString(random, REPLACE_LITERAL_MAX_LENGTH);
    return {
      name: 'replace',
      text: call('replace', [property.name, find, replacement]),
      properties: [property],
      params: [find, replacement],
      returnType: stringReturn(random),
    };
  },
  substring(properties, random) {
    const property = choice(random, properties);
    const params = coin(random) ? [generateByte(random), generateByte(random)] : [generateByte(random)];
    return {
      name: 'substring',
      text: call('substring', [property.name, ...params]),
      properties: [property],
      params,
      returnType: stringReturn(random),
    };
  },
  tolower: unary('tolower', stringReturn),
  toupper: unary('toupper', stringReturn),
  trim: unary('trim', stringReturn),
  concat(properties, random) {
    const property = choice(random, properties);
    if (coin(random)) {
      const value = generateString(random, CONCAT_LITERAL_MAX_LENGTH);
      return {
        name: 'concat',
        text: call('concat', [property.name, value]),
        properties: [property],
        params: [value],
        returnType: stringReturn(random),
      };
    }
    const other = choice(random, properties);
    return {
      name: 'concat',
      text: call('concat', [property.name, other.name]),
      properties: [property, other],
      params: [],
      returnType: stringReturn(random),
    };
  },
};

const DATE_FUNCTIONS: Readonly<Record<string, FunctionFactory>> = {
  day: unary('day', intReturn),
  hour: unary('hour', intReturn),
  minute: unary('minute', intReturn),
  month: unary('month', intReturn),
  second: unary('second', intReturn),
  year: unary('year', intReturn),
};

const MATH_FUNCTIONS: Readonly<Record<string, FunctionFactory>> = {
  round: unary('round', intReturn),
  floor: unary('floor', intReturn),
  ceiling: unary('ceiling', intReturn),
};

interface CategoryDefinition {
  readonly name: FunctionCategoryName;
  readonly types: readonly EdmTypeName[];
  readonly probability: number;
  readonly functions: Readonly<Record<string, FunctionFactory>>;
}

const CATEGORY_DEFINITIONS: readonly CategoryDefinition[] = [
  { name: 'String', types: ['Edm.String'], probability: STRING_FUNC_PROB, functions: STRING_FUNCTIONS },
  { name: 'Date', types: ['Edm.DateTime', 'Edm.DateTimeOffset'], probability: DATE_FUNC_PROB, functions: DATE_FUNCTIONS },
  {
    name: 'Math',
    types: ['Edm.Decimal', 'Edm.Double', 'Edm.Single'],
    probability: MATH_FUNC_PROB,
    functions: MATH_FUNCTIONS,
  },
];

/** Every function name the catalog knows, across categories. */
export const FILTER_FUNCTION_NAMES: readonly string[] = CATEGORY_DEFINITIONS.flatMap((d) => Object.keys(d.functions));

/**
 * Functions of one argument-type category together with the properties
 * eligible as their arguments.
 */
export class FilterFunctionCategory {
  readonly functionNames: readonly string[];
  private readonly _properties: FilterProperty[];

  constructor(
    readonly name: FunctionCategoryName,
    readonly probability: number,
    private readonly factories: Readonly<Record<string, FunctionFactory>>,
    properties: readonly FilterProperty[],
    excluded: ReadonlySet<string>,
  ) {
    this.functionNames = Object.keys(factories).filter((fn) => !excluded.has(fn));
    this._properties = [...properties];
  }

  get properties(): readonly FilterProperty[] {
    return this._properties;
  }

  generate(random: RandomSource): FilterFunction {
    const name = choice(random, this.functionNames);
    const factory = this.factories[name];
    if (factory === undefined) {
      throw new Error(`Unknown filter function "${name}" in category ${this.name}`);
    }
    return factory(this._properties, random);
  }
}

export interface FunctionCatalogOptions {
  random: RandomSource;
  /** Function names removed from every category, e.g. `concat`. */
  excludedFunctions?: ReadonlySet<string>;
  selection?: CategorySelection;
  /** Overrides of the default category probabilities. */
  weights?: Readonly<Partial<Record<FunctionCategoryName, number>>>;
}

/**
 * Built-in filter functions available for one entity, grouped by the type
 * of property they take. Exclusions are applied once, here; a category left
 * without functions or without eligible properties is not offered, nor is
 * one weighted 0 under weighted selection.
 */
export class FilterFunctionsGroup {
  private readonly _categories: FilterFunctionCategory[] = [];
  private readonly random: RandomSource;
  readonly selection: CategorySelection;

  constructor(properties: readonly FilterProperty[], options: FunctionCatalogOptions) {
    this.random = options.random;
    this.selection = options.selection ?? 'weighted';
    const excluded = options.excludedFunctions ?? new Set<string>();

    for (const def of CATEGORY_DEFINITIONS) {
      const eligible = properties.filter((p) => def.types.includes(p.type));
      if (eligible.length === 0) continue;
      const probability = options.weights?.[def.name] ?? def.probability;
      if (this.selection === 'weighted' && !(probability > 0)) continue;
      const category = new FilterFunctionCategory(def.name, probability, def.functions, eligible, excluded);
      if (category.functionNames.length > 0) {
        this._categories.push(category);
      }
    }
  }

  get categories(): readonly FilterFunctionCategory[] {
    return this._categories;
  }

  get isEmpty(): boolean {
    return this._categories.length === 0;
  }

  availableFunctions(): string[] {
    return [...new Set(this._categories.flatMap((c) => c.functionNames))];
  }

  selectCategory(): FilterFunctionCategory {
    if (this.selection === 'uniform') {
      return choice(this.random, this._categories);
    }
    return weightedChoice(
      this.random,
      this._categories.map((c) => [c, c.probability] as const),
    );
  }

  generate(): FilterFunction {
    return this.selectCategory().generate(this.random);
  }
}
