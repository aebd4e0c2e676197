import { type FuzzerConfig, type ResolvedConfig, resolveConfig } from '../config.js';
import type { Restrictions } from '../restrictions/types.js';
import type { SchemaAdapter } from '../schema/types.js';
import { QueryGroup } from './group.js';
import { QueryableEntities } from './queryable.js';

/**
 * Turns a schema into one query group per entity set. All groups share the
 * builder's random source, so a seeded config reproduces a whole campaign.
 */
export class Builder {
  private readonly resolved: ResolvedConfig;
  private readonly restrictions: Restrictions | undefined;

  constructor(
    private readonly schema: SchemaAdapter,
    restrictions?: Restrictions,
    config: FuzzerConfig = {},
  ) {
    this.restrictions = restrictions;
    this.resolved = resolveConfig(config);
  }

  build(): QueryableEntities {
    const queryable = new QueryableEntities();
    for (const entitySet of this.schema.entitySets()) {
      queryable.add(new QueryGroup(entitySet, this.restrictions, this.resolved));
    }
    return queryable;
  }
}
