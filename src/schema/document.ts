import { z } from 'zod';
import { invalidDocument } from '../errors.js';
import type { EntityProperty, EntitySet, SchemaAdapter } from './types.js';

const propertySchema = z.object({
  name: z.string().min(1),
  type: z.string().min(1),
  filterable: z.boolean().default(true),
  filterRestriction: z.enum(['single-value', 'multi-value', 'interval']).optional(),
  maxLength: z.number().int().nonnegative().optional(),
  precision: z.number().int().positive().optional(),
  scale: z.number().int().nonnegative().optional(),
});

const entitySetSchema = z.object({
  name: z.string().min(1),
  filterable: z.boolean().default(true),
  searchable: z.boolean().default(false),
  pageable: z.boolean().default(true),
  topable: z.boolean().default(true),
  requiresFilter: z.boolean().default(false),
  properties: z.array(propertySchema),
});

const schemaDocumentSchema = z
  .object({
    entitySets: z.array(entitySetSchema),
  })
  .superRefine((doc, ctx) => {
    const seen = new Set<string>();
    doc.entitySets.forEach((set, index) => {
      if (seen.has(set.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['entitySets', index, 'name'],
          message: `duplicate entity set "${set.name}"`,
        });
      }
      seen.add(set.name);
    });
  });

type PropertyDocument = z.infer<typeof propertySchema>;
type EntitySetDocument = z.infer<typeof entitySetSchema>;

function toProperty(doc: PropertyDocument): EntityProperty {
  return {
    name: doc.name,
    type: doc.type,
    filterable: doc.filterable,
    ...(doc.filterRestriction !== undefined ? { filterRestriction: doc.filterRestriction } : {}),
    ...(doc.maxLength !== undefined ? { maxLength: doc.maxLength } : {}),
    ...(doc.precision !== undefined ? { precision: doc.precision } : {}),
    ...(doc.scale !== undefined ? { scale: doc.scale } : {}),
  };
}

function toEntitySet(doc: EntitySetDocument): EntitySet {
  return {
    name: doc.name,
    filterable: doc.filterable,
    searchable: doc.searchable,
    pageable: doc.pageable,
    topable: doc.topable,
    requiresFilter: doc.requiresFilter,
    properties: doc.properties.map(toProperty),
  };
}

export class InMemorySchema implements SchemaAdapter {
  constructor(private readonly sets: readonly EntitySet[]) {}

  entitySets(): readonly EntitySet[] {
    return this.sets;
  }
}

/**
 * Validates a JSON description of entity sets and wraps it as a schema adapter.
 * Capability flags default to what most services allow: filterable,
 * pageable, topable, not searchable, filter optional.
 */
export function parseSchemaDocument(input: unknown): InMemorySchema {
  const result = schemaDocumentSchema.safeParse(input);
  if (!result.success) {
    throw invalidDocument('Invalid schema document', result.error);
  }
  return new InMemorySchema(result.data.entitySets.map(toEntitySet));
}
