import { FUNCTION_WEIGHT, MAX_SKIP, MAX_STRING_LENGTH, MAX_TOP, RECURSION_LIMIT } from './constants.js';
import type { CategorySelection, FunctionCategoryName } from './filter/functions.js';
import { type RandomSource, createRandom } from './random.js';

export type WarningHandler = (message: string, detail?: unknown) => void;

export interface FuzzerConfig {
  /** Random source shared by every generator of one builder. Takes precedence over `seed`. */
  random?: RandomSource;
  seed?: number;
  recursionLimit?: number;
  functionWeight?: number;
  categorySelection?: CategorySelection;
  categoryWeights?: Partial<Record<FunctionCategoryName, number>>;
  maxStringLength?: number;
  maxTop?: number;
  maxSkip?: number;
  /**
   * Text appended verbatim to every rendered filter of an entity set,
   * e.g. `{ C_CostCenter: ' and IsActiveEntity eq true' }`.
   */
  filterSuffixes?: Record<string, string>;
  onWarning?: WarningHandler;
}

export interface ResolvedConfig {
  random: RandomSource;
  recursionLimit: number;
  functionWeight: number;
  categorySelection: CategorySelection;
  categoryWeights: Partial<Record<FunctionCategoryName, number>>;
  maxStringLength: number;
  maxTop: number;
  maxSkip: number;
  filterSuffixes: Readonly<Record<string, string>>;
  onWarning: WarningHandler;
}

export function resolveConfig(config: FuzzerConfig = {}): ResolvedConfig {
  const onWarning: WarningHandler = config.onWarning ?? ((message, detail) => {
    if (detail === undefined) {
      console.warn(`[fuzzer] ${message}`);
    } else {
      console.warn(`[fuzzer] ${message}`, detail);
    }
  });
  return {
    random: config.random ?? createRandom(config.seed),
    recursionLimit: config.recursionLimit ?? RECURSION_LIMIT,
    functionWeight: config.functionWeight ?? FUNCTION_WEIGHT,
    categorySelection: config.categorySelection ?? 'weighted',
    categoryWeights: config.categoryWeights ?? {},
    maxStringLength: config.maxStringLength ?? MAX_STRING_LENGTH,
    maxTop: config.maxTop ?? MAX_TOP,
    maxSkip: config.maxSkip ?? MAX_SKIP,
    filterSuffixes: config.filterSuffixes ?? {},
    onWarning: (message, detail) => {
      try {
        onWarning(message, detail);
      } catch (err) {
        console.error('[fuzzer] onWarning hook threw:', err);
      }
    },
  };
}
