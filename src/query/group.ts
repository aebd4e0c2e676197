import type { ResolvedConfig } from '../config.js';
import { createFilterProperty } from '../edm/capability.js';
import type { FilterProperty } from '../edm/types.js';
import { randomInt, sample } from '../random.js';
import {
  NO_RESTRICTION,
  type OptionRestriction,
  type Restrictions,
  excludedPropertiesOf,
  isEntityAllowed,
} from '../restrictions/types.js';
import type { EntitySet } from '../schema/types.js';
import type { QueryOptionName } from '../types.js';
import {
  FilterOption,
  type GeneratedOption,
  type QueryOption,
  SearchOption,
  SkipOption,
  TopOption,
} from './options.js';

/**
 * The query options applicable to one entity set.
 *
 * An option is applicable when the entity set declares the capability and
 * the option's restriction lets the entity set through. `$filter` also needs
 * at least one usable property; for entity sets that require a filter it is
 * generated on every call.
 */
export class QueryGroup {
  private readonly options = new Map<QueryOptionName, QueryOption>();
  private readonly required: QueryOption[] = [];
  private readonly optional: QueryOption[] = [];

  constructor(
    readonly entitySet: EntitySet,
    private readonly restrictions: Restrictions | undefined,
    private readonly config: ResolvedConfig,
  ) {
    this.initFilterOption();
    this.initOption('search', entitySet.searchable, () => new SearchOption(config));
    this.initOption('$top', entitySet.topable, () => new TopOption(config));
    this.initOption('$skip', entitySet.pageable, () => new SkipOption(config));
  }

  queryOptions(): QueryOption[] {
    return [...this.options.values()];
  }

  queryOption(name: QueryOptionName): QueryOption | undefined {
    return this.options.get(name);
  }

  /** The filter option, when `$filter` is applicable. */
  get filterOption(): FilterOption | undefined {
    const option = this.options.get('$filter');
    return option instanceof FilterOption ? option : undefined;
  }

  /**
   * Required options followed by a random subset of the optional ones,
   * its size drawn uniformly from 0..n.
   */
  randomOptions(): QueryOption[] {
    const count = randomInt(this.config.random, 0, this.optional.length);
    return [...this.required, ...sample(this.config.random, this.optional, count)];
  }

  generate(): GeneratedOption[] {
    return this.randomOptions().map((option) => option.generate());
  }

  private restriction(name: QueryOptionName): OptionRestriction {
    return this.restrictions?.restriction(name) ?? NO_RESTRICTION;
  }

  private initOption(name: QueryOptionName, capable: boolean, create: () => QueryOption): void {
    if (!capable || !isEntityAllowed(this.restriction(name), this.entitySet.name)) {
      return;
    }
    const option = create();
    this.options.set(name, option);
    this.optional.push(option);
  }

  private initFilterOption(): void {
    const restriction = this.restriction('$filter');
    if (!this.entitySet.filterable || !isEntityAllowed(restriction, this.entitySet.name)) {
      return;
    }
    const properties = this.filterProperties(restriction);
    if (properties.length === 0) {
      this.config.onWarning(`Entity set "${this.entitySet.name}" has no usable filter property`);
      return;
    }
    const option = new FilterOption(this.entitySet.name, properties, restriction, this.config);
    this.options.set('$filter', option);
    if (this.entitySet.requiresFilter) {
      this.required.push(option);
    } else {
      this.optional.push(option);
    }
  }

  private filterProperties(restriction: OptionRestriction): FilterProperty[] {
    const excluded = excludedPropertiesOf(restriction, this.entitySet.name);
    const properties: FilterProperty[] = [];
    for (const property of this.entitySet.properties) {
      if (!property.filterable || excluded.has(property.name)) continue;
      const capability = createFilterProperty(property, this.config.random, {
        maxStringLength: this.config.maxStringLength,
      });
      if (capability === undefined) {
        this.config.onWarning(
          `Property "${this.entitySet.name}.${property.name}" has unsupported type ${property.type}; dropped from $filter`,
          { entitySet: this.entitySet.name, property: property.name, type: property.type },
        );
        continue;
      }
      properties.push(capability);
    }
    return properties;
  }
}
