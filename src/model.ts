/**
 * Core data model types for the report engine.
 *
 * Design principle: Immutable, readonly types. No methods that mutate.
 */

// === Schema Types ===

export interface ColumnInfo {
  readonly name: string;
  readonly type: string;
  readonly nullable: boolean;
  readonly isPrimaryKey: boolean;
}

export interface ForeignKeyRef {
  readonly localColumn: string;
  readonly referencedTable: string;
  readonly referencedColumn: string;
}

export interface TableSchema {
  readonly name: string;
  /** Keyed by column name, in ordinal order */
  readonly columns: ReadonlyMap<string, ColumnInfo>;
  readonly foreignKeys: readonly ForeignKeyRef[];
}

/**
 * How a foreign-key-derived column reaches its lookup table.
 */
export interface JoinDescriptor {
  readonly targetTable: string;
  /** Set when the target table is joined more than once from the same table */
  readonly alias?: string;
  readonly localKey: string;
  readonly foreignKey: string;
  readonly displayName: string;
}

export interface EnhancedColumn {
  readonly name: string;
  readonly displayName: string;
  readonly type: string;
  /** Qualified SQL expression, e.g. `statuses.name` */
  readonly expression: string;
  /** `null` for base columns of the table itself */
  readonly join: JoinDescriptor | null;
}

// === Report Configuration ===

export const FILTER_OPERATORS = [
  'eq', 'ne', 'gt', 'ge', 'lt', 'le',
  'like', 'ilike', 'in', 'not_in', 'between',
  'is_null', 'is_not_null', 'starts_with', 'ends_with',
] as const;

export type FilterOperator = typeof FILTER_OPERATORS[number];

export type FilterValue = string | number | boolean;

export interface FilterClause {
  readonly column: string;
  readonly operator: FilterOperator;
  readonly value?: FilterValue;
  /** Upper bound, only for `between` */
  readonly value2?: FilterValue;
}

export const JOIN_TYPES = ['INNER', 'LEFT', 'RIGHT', 'FULL'] as const;

export type JoinType = typeof JOIN_TYPES[number];

export interface JoinClause {
  readonly type: JoinType;
  readonly table: string;
  readonly condition: string;
}

export type SortDirection = 'asc' | 'desc';

export interface SortSpec {
  readonly column: string;
  readonly order?: SortDirection;
}

export interface ReportConfig {
  readonly primaryTable: string;
  readonly columns: readonly string[];
  readonly filters?: readonly FilterClause[];
  readonly joins?: readonly JoinClause[];
  readonly groupBy?: readonly string[];
  readonly orderBy?: string;
  readonly direction?: SortDirection;
  readonly sorting?: SortSpec;
  readonly limit?: number;
}

/**
 * A report configuration as it arrives from outside, before validation.
 */
export interface ReportConfigDraft {
  readonly primaryTable?: string;
  readonly columns?: readonly string[];
  readonly filters?: readonly Partial<Omit<FilterClause, 'operator'> & { operator: string }>[];
  readonly joins?: readonly Partial<Omit<JoinClause, 'type'> & { type: string }>[];
  readonly groupBy?: readonly string[];
  readonly orderBy?: string;
  readonly direction?: string;
  readonly sorting?: Partial<Omit<SortSpec, 'order'> & { order: string }>;
  readonly limit?: number;
}

// === Results ===

export type ResultValue = string | number | boolean | null;

export type ResultRecord = Readonly<Record<string, ResultValue>>;

export interface QueryResult {
  readonly success: boolean;
  readonly records: readonly ResultRecord[];
  readonly columns: readonly string[];
  readonly rowCount: number;
  readonly executionTimeMs: number;
  readonly sql: string;
  readonly error?: string;
}

export interface JoinSuggestion {
  readonly condition: string;
  readonly type: JoinType;
  readonly description: string;
}

// === Helpers ===

export function isFilterOperator(value: string): value is FilterOperator {
  return (FILTER_OPERATORS as readonly string[]).includes(value);
}

export function isJoinType(value: string): value is JoinType {
  return (JOIN_TYPES as readonly string[]).includes(value);
}

/**
 * A filter value, or `undefined` when it is absent or empty.
 */
export function presentValue(value: FilterValue | null | undefined): FilterValue | undefined {
  return value === undefined || value === null || value === '' ? undefined : value;
}

/**
 * `work_orders` -> `Work Orders`
 */
export function toDisplayName(name: string): string {
  return name
    .split('_')
    .filter(part => part.length > 0)
    .map(part => part[0].toUpperCase() + part.slice(1))
    .join(' ');
}
