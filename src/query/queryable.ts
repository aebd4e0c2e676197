import type { QueryGroup } from './group.js';

/** Entity set name → its query group. */
export class QueryableEntities {
  private readonly groups = new Map<string, QueryGroup>();

  add(group: QueryGroup): void {
    this.groups.set(group.entitySet.name, group);
  }

  get(entitySetName: string): QueryGroup | undefined {
    return this.groups.get(entitySetName);
  }

  all(): QueryGroup[] {
    return [...this.groups.values()];
  }

  get size(): number {
    return this.groups.size;
  }
}
