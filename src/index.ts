export { Builder } from './query/builder.js';
export { QueryableEntities } from './query/queryable.js';
export { QueryGroup } from './query/group.js';
export { FilterOption, SearchOption, SkipOption, TopOption, formatQueryOptions } from './query/options.js';
export type { GeneratedFilter, GeneratedOption, QueryOption } from './query/options.js';
export { resolveConfig } from './config.js';
export type { FuzzerConfig, ResolvedConfig, WarningHandler } from './config.js';
export { createRandom } from './random.js';
export type { RandomSource } from './random.js';
export { parseSchemaDocument, InMemorySchema } from './schema/document.js';
export type { EntityProperty, EntitySet, FilterRestrictionKind, SchemaAdapter } from './schema/types.js';
export { parseRestrictions, RestrictionSet } from './restrictions/parse.js';
export type { OptionRestriction, Restrictions } from './restrictions/types.js';
export { createFilterProperty, EdmFilterProperty } from './edm/capability.js';
export { EDM_TYPE_NAMES } from './edm/types.js';
export type { ComparisonOperator, Connective, EdmTypeName, FilterProperty, OperatorTable } from './edm/types.js';
export { QUERY_OPTION_NAMES } from './types.js';
export type { QueryOptionName } from './types.js';
export { GeneratorConfigurationError, InvalidDocumentError, UnrenderableGraphError } from './errors.js';
export { ExpressionGraph, FilterQuery, renderFilter } from './filter/index.js';
export type { GroupNode, LogicalNode, NodeId, PartNode } from './filter/index.js';
