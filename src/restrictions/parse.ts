import { z } from 'zod';
import { invalidDocument } from '../errors.js';
import { QUERY_OPTION_NAMES, type QueryOptionName } from '../types.js';
import { NO_RESTRICTION, type OptionRestriction, type Restrictions } from './types.js';

const nameList = z.array(z.string().min(1));

const optionRestrictionSchema = z
  .object({
    exclude: z
      .object({
        entities: nameList.default([]),
        properties: z.record(z.string(), nameList).default({}),
        functions: nameList.default([]),
      })
      .strict()
      .default({}),
    include: z
      .object({
        entities: nameList,
      })
      .strict()
      .optional(),
  })
  .strict();

const restrictionsDocumentSchema = z
  .object({
    $filter: optionRestrictionSchema.optional(),
    search: optionRestrictionSchema.optional(),
    $top: optionRestrictionSchema.optional(),
    $skip: optionRestrictionSchema.optional(),
  })
  .strict();

type OptionRestrictionDocument = z.infer<typeof optionRestrictionSchema>;

function toOptionRestriction(doc: OptionRestrictionDocument): OptionRestriction {
  return {
    excludedEntities: new Set(doc.exclude.entities),
    includedEntities: doc.include !== undefined ? new Set(doc.include.entities) : null,
    excludedProperties: new Map(
      Object.entries(doc.exclude.properties).map(([entity, props]) => [entity, new Set(props)]),
    ),
    excludedFunctions: new Set(doc.exclude.functions),
  };
}

export class RestrictionSet implements Restrictions {
  private readonly byOption: ReadonlyMap<QueryOptionName, OptionRestriction>;

  constructor(byOption: ReadonlyMap<QueryOptionName, OptionRestriction> = new Map()) {
    this.byOption = byOption;
  }

  restriction(option: QueryOptionName): OptionRestriction {
    return this.byOption.get(option) ?? NO_RESTRICTION;
  }
}

/**
 * Validates a restrictions document, e.g.
 * `{"$filter": {"exclude": {"entities": ["Logs"], "properties": {"Orders": ["Note"]}, "functions": ["concat"]}}}`.
 */
export function parseRestrictions(input: unknown): RestrictionSet {
  const result = restrictionsDocumentSchema.safeParse(input);
  if (!result.success) {
    throw invalidDocument('Invalid restrictions document', result.error);
  }
  const byOption = new Map<QueryOptionName, OptionRestriction>();
  for (const name of QUERY_OPTION_NAMES) {
    const parsed = result.data[name];
    if (parsed !== undefined) {
      byOption.set(name, toOptionRestriction(parsed));
    }
  }
  return new RestrictionSet(byOption);
}
