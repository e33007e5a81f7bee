export {
  Attribute,
  BooleanAttribute,
  EnumerativeAttribute,
  NonFilterableAttribute,
  FilterableAttribute,
  OrderedAttribute,
} from './query/attribute.js';
export type { AnyAttribute, EnumAccessor, EnumerationValues } from './query/attribute.js';
export { BooleanExpression, BooleanExpressionClause, and, or, not } from './query/expression.js';
export type {
  AttributeKind,
  ChainOperator,
  Comparator,
  ExpressionElement,
  FilterValue,
  ResolvedExpression,
  SortDirection,
} from './query/types.js';
export { Query } from './query/query.js';
export type { OrderClause } from './query/compiler.js';
export { BulkAction, BulkActionContext } from './query/bulk.js';
export type { BulkActionFn, Executable } from './query/bulk.js';
export { ODataQueryBuilder } from './protocol/odata-builder.js';
export type { ODataParams } from './protocol/odata-builder.js';
export { GraphProtocol, OfficeProtocol, createProtocol } from './protocol/protocol.js';
export { resolveConfig, loadConfigFromEnv, toQueryOptions, QueryConfigSchema } from './config/index.js';
export type { QueryConfig, ProtocolName, QueryHooks } from './config/index.js';
export type {
  RemoteQueryBuilder,
  Protocol,
  OfficeHandle,
  FolderRef,
  QueryContainer,
  FetchOptions,
  QueryOptions,
  ExecuteEvent,
  UncommittedEvent,
} from './types.js';
export { AttributeUsageError, QueryUsageError, QueryCompileError, ConfigError } from './errors.js';
