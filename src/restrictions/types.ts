import type { QueryOptionName } from '../types.js';

/**
 * Narrowing applied to one query option.
 */
export interface OptionRestriction {
  /** Entity sets for which the option is never generated. */
  readonly excludedEntities: ReadonlySet<string>;
  /** When set, only these entity sets get the option. */
  readonly includedEntities: ReadonlySet<string> | null;
  /** Entity set name → properties that must not appear in the option. */
  readonly excludedProperties: ReadonlyMap<string, ReadonlySet<string>>;
  /** Built-in filter functions never generated, for any entity set. */
  readonly excludedFunctions: ReadonlySet<string>;
}

export interface Restrictions {
  /** Always returns a restriction; an option nobody mentioned is unrestricted. */
  restriction(option: QueryOptionName): OptionRestriction;
}

export const NO_RESTRICTION: OptionRestriction = {
  excludedEntities: new Set(),
  includedEntities: null,
  excludedProperties: new Map(),
  excludedFunctions: new Set(),
};

export function isEntityAllowed(restriction: OptionRestriction, entitySetName: string): boolean {
  if (restriction.excludedEntities.has(entitySetName)) {
    return false;
  }
  return restriction.includedEntities === null || restriction.includedEntities.has(entitySetName);
}

export function excludedPropertiesOf(restriction: OptionRestriction, entitySetName: string): ReadonlySet<string> {
  return restriction.excludedProperties.get(entitySetName) ?? new Set();
}
