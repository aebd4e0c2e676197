export type FilterRestrictionKind = 'single-value' | 'multi-value' | 'interval';

export interface EntityProperty {
  readonly name: string;
  /** EDM type name as declared in metadata, e.g. `Edm.String`. */
  readonly type: string;
  readonly filterable: boolean;
  readonly filterRestriction?: FilterRestrictionKind;
  readonly maxLength?: number;
  readonly precision?: number;
  readonly scale?: number;
}

export interface EntitySet {
  readonly name: string;
  readonly filterable: boolean;
  readonly searchable: boolean;
  readonly pageable: boolean;
  readonly topable: boolean;
  /** The service rejects reads of this set without a $filter. */
  readonly requiresFilter: boolean;
  readonly properties: readonly EntityProperty[];
}

/**
 * Already-parsed service metadata. Retrieval and EDMX parsing live elsewhere.
 */
export interface SchemaAdapter {
  entitySets(): readonly EntitySet[];
}
