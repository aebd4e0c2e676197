export { ExpressionGraph } from './graph.js';
export type { FunctionCall, GraphNode, GroupNode, LogicalNode, NewPart, NodeId, PartNode } from './graph.js';
export { NestingStack } from './stack.js';
export { FilterQuery } from './generator.js';
export type { FilterQueryOptions } from './generator.js';
export { FilterOptionBuilder, buildFilterPart, renderFilter } from './renderer.js';
export { FILTER_FUNCTION_NAMES, FilterFunctionCategory, FilterFunctionsGroup } from './functions.js';
export type {
  CategorySelection,
  FilterFunction,
  FunctionCatalogOptions,
  FunctionCategoryName,
} from './functions.js';
export type { FunctionReturnType, FunctionReturnTypeName } from './return-types.js';
