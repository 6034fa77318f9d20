// Core data model
export type {
  ColumnInfo,
  ForeignKeyRef,
  TableSchema,
  JoinDescriptor,
  EnhancedColumn,
  FilterOperator,
  FilterValue,
  FilterClause,
  JoinType,
  JoinClause,
  SortDirection,
  SortSpec,
  ReportConfig,
  ReportConfigDraft,
  ResultValue,
  ResultRecord,
  QueryResult,
  JoinSuggestion,
} from './model';

export { FILTER_OPERATORS, JOIN_TYPES, toDisplayName } from './model';

// Errors
export {
  ReportError,
  ConfigValidationError,
  UnknownTableError,
  ColumnNotFoundError,
  QueryBuildError,
  SafetyRejectionError,
  ExecutionError,
} from './errors';

// Schema catalog
export type { DbClient } from './schemaExtractor';
export { extractTableNames, extractTableSchema } from './schemaExtractor';
export type { CatalogOptions, LookupTableMap } from './schemaCatalog';
export { SchemaCatalog, DEFAULT_LOOKUP_TABLES, DEFAULT_EXCLUDED_PREFIXES } from './schemaCatalog';

// Column resolution
export type { ResolvedColumns, ResolvedJoin } from './columnResolver';
export { resolveColumns } from './columnResolver';

// Query building
export type { SqlStatement } from './queryBuilder';
export { buildQuery, buildParameterizedQuery, quoteLiteral } from './queryBuilder';
export { escapeIdentifier, quoteIdentifier, quoteReference } from './identifiers';

// Validation
export type { SafetyVerdict } from './queryValidator';
export { validateConfig, validateQuerySafety, assertQuerySafe, FORBIDDEN_KEYWORDS } from './queryValidator';

// Execution
export type { ExecutorOptions, ExecuteOptions } from './queryExecutor';
export { DATE_TYPE_ID, QueryExecutor, normalizeValue } from './queryExecutor';

// Export
export type { SpreadsheetOptions } from './resultExporter';
export { toCsv, toSpreadsheet } from './resultExporter';

// Join suggestions
export { suggestJoins } from './joinAdvisor';

// Report config files
export type { JsonSchema, ReportConfigFile } from './reportConfigFile';
export { parseReportConfig, generateReportConfigSchema, reportConfigSchema } from './reportConfigFile';

// Engine facade
export type { ReportEngineOptions, RunReportOptions, TableInfo } from './reportEngine';
export { ReportEngine } from './reportEngine';
