import type { ResolvedConfig } from '../config.js';
import { SEARCH_TERM_MAX_LENGTH } from '../constants.js';
import { generateWord } from '../edm/generators.js';
import type { FilterProperty } from '../edm/types.js';
import { FilterQuery } from '../filter/generator.js';
import type { ExpressionGraph } from '../filter/graph.js';
import { renderFilter } from '../filter/renderer.js';
import { randomInt } from '../random.js';
import type { OptionRestriction } from '../restrictions/types.js';
import type { QueryOptionName } from '../types.js';

export interface GeneratedOption {
  readonly name: QueryOptionName;
  readonly value: string;
}

/** A generated `$filter` keeps its graph so it can be mutated and rendered again. */
export interface GeneratedFilter extends GeneratedOption {
  readonly name: '$filter';
  readonly graph: ExpressionGraph;
}

export interface QueryOption {
  readonly name: QueryOptionName;
  generate(): GeneratedOption;
}

export class FilterOption implements QueryOption {
  readonly name = '$filter';
  readonly query: FilterQuery;
  private readonly suffix: string;

  constructor(
    readonly entitySetName: string,
    properties: readonly FilterProperty[],
    restriction: OptionRestriction,
    config: ResolvedConfig,
  ) {
    this.query = new FilterQuery(entitySetName, properties, {
      random: config.random,
      recursionLimit: config.recursionLimit,
      functionWeight: config.functionWeight,
      excludedFunctions: restriction.excludedFunctions,
      categorySelection: config.categorySelection,
      categoryWeights: config.categoryWeights,
    });
    this.suffix = config.filterSuffixes[entitySetName] ?? '';
  }

  generate(): GeneratedFilter {
    const graph = this.query.generate();
    return { name: this.name, value: this.render(graph), graph };
  }

  /** Renders a (possibly mutated) graph and appends the entity's forced suffix. */
  render(graph: ExpressionGraph): string {
    return renderFilter(graph) + this.suffix;
  }
}

export class SearchOption implements QueryOption {
  readonly name = 'search';

  constructor(private readonly config: ResolvedConfig) {}

  generate(): GeneratedOption {
    return { name: this.name, value: generateWord(this.config.random, SEARCH_TERM_MAX_LENGTH) };
  }
}

export class TopOption implements QueryOption {
  readonly name = '$top';

  constructor(private readonly config: ResolvedConfig) {}

  generate(): GeneratedOption {
    return { name: this.name, value: String(randomInt(this.config.random, 0, this.config.maxTop)) };
  }
}

export class SkipOption implements QueryOption {
  readonly name = '$skip';

  constructor(private readonly config: ResolvedConfig) {}

  generate(): GeneratedOption {
    return { name: this.name, value: String(randomInt(this.config.random, 0, this.config.maxSkip)) };
  }
}

/** `name=value` pairs joined with `&`; values are not URL-encoded. */
export function formatQueryOptions(options: readonly GeneratedOption[]): string {
  return options.map((o) => `${o.name}=${o.value}`).join('&');
}
