import type { FilterClause, FilterOperator, FilterValue, ReportConfig, SortDirection } from './model';
import { isFilterOperator, presentValue } from './model';
import type { SchemaCatalog } from './schemaCatalog';
import { resolveColumns, type ResolvedJoin } from './columnResolver';
import { QueryBuildError, ReportError, errorMessage } from './errors';
import { quoteIdentifier, quoteReference } from './identifiers';

export { escapeIdentifier } from './identifiers';

export interface SqlStatement {
  sql: string;
  params: unknown[];
}

/**
 * Quote a value as a SQL string literal, doubling embedded single quotes.
 */
export function quoteLiteral(value: FilterValue): string {
  return `'${String(value).replace(/'/g, "''")}'`;
}

/** Turns a filter value into SQL text: either an inlined literal or a placeholder */
type Bind = (value: FilterValue) => string;

/**
 * Build the report's SELECT statement with filter values inlined as quoted literals.
 *
 * @throws QueryBuildError, UnknownTableError, ColumnNotFoundError
 */
export function buildQuery(catalog: SchemaCatalog, config: ReportConfig): string {
  return compose(catalog, config, quoteLiteral);
}

/**
 * Build the report's SELECT statement with filter values bound as `$n` parameters.
 * Same clauses and layout as {@link buildQuery}.
 */
export function buildParameterizedQuery(catalog: SchemaCatalog, config: ReportConfig): SqlStatement {
  const params: unknown[] = [];
  const sql = compose(catalog, config, value => {
    params.push(String(value));
    return `$${params.length}`;
  });
  return { sql, params };
}

function compose(catalog: SchemaCatalog, config: ReportConfig, bind: Bind): string {
  if (!config.primaryTable) {
    throw new QueryBuildError('No primary table specified');
  }
  if (!config.columns?.length) {
    throw new QueryBuildError('At least one column is required');
  }

  try {
    const table = config.primaryTable;
    const { columns, joins } = resolveColumns(catalog, table, config.columns);

    const clauses = [`SELECT ${columns.join(', ')}`, `FROM ${quoteIdentifier(table)}`];

    for (const join of joins) {
      clauses.push(lookupJoin(table, join));
    }
    for (const join of config.joins ?? []) {
      clauses.push(`${join.type} JOIN ${quoteReference(join.table)} ON ${join.condition}`);
    }

    const conditions = (config.filters ?? []).map(filter => compileFilter(filter, bind));
    if (conditions.length > 0) {
      clauses.push(`WHERE ${conditions.join(' AND ')}`);
    }

    if (config.groupBy && config.groupBy.length > 0) {
      clauses.push(`GROUP BY ${config.groupBy.map(quoteReference).join(', ')}`);
    }

    const orderBy = compileOrderBy(catalog, config);
    if (orderBy) {
      clauses.push(`ORDER BY ${orderBy}`);
    }

    if (config.limit !== undefined && Number.isInteger(config.limit) && config.limit > 0) {
      clauses.push(`LIMIT ${config.limit}`);
    }

    return clauses.join(' ');
  } catch (error) {
    if (error instanceof ReportError) throw error;
    throw new QueryBuildError(`Failed to build query: ${errorMessage(error)}`, { cause: error });
  }
}

function lookupJoin(primaryTable: string, join: ResolvedJoin): string {
  const table = quoteIdentifier(join.table);
  const reference = quoteIdentifier(join.alias ?? join.table);
  const target = join.alias ? `${table} AS ${reference}` : table;
  const localKey = `${quoteIdentifier(primaryTable)}.${quoteIdentifier(join.localKey)}`;
  return `LEFT JOIN ${target} ON ${localKey} = ${reference}.${quoteIdentifier(join.foreignKey)}`;
}

// === Filters ===

type CompileOperator = (column: string, filter: FilterClause, bind: Bind) => string;

const OPERATORS: { readonly [K in FilterOperator]: CompileOperator } = {
  eq: (column, filter, bind) => `${column} = ${bind(requireValue(filter))}`,
  ne: (column, filter, bind) => `${column} != ${bind(requireValue(filter))}`,
  gt: (column, filter, bind) => `${column} > ${bind(requireValue(filter))}`,
  ge: (column, filter, bind) => `${column} >= ${bind(requireValue(filter))}`,
  lt: (column, filter, bind) => `${column} < ${bind(requireValue(filter))}`,
  le: (column, filter, bind) => `${column} <= ${bind(requireValue(filter))}`,
  like: (column, filter, bind) => `${column} LIKE ${bind(requireValue(filter))}`,
  ilike: (column, filter, bind) => `${column} ILIKE ${bind(requireValue(filter))}`,
  in: (column, filter, bind) => `${column} IN (${splitList(filter).map(bind).join(', ')})`,
  not_in: (column, filter, bind) => `${column} NOT IN (${splitList(filter).map(bind).join(', ')})`,
  between: (column, filter, bind) => {
    const upper = presentValue(filter.value2);
    if (upper === undefined) {
      throw new QueryBuildError(`Filter on ${column}: operator "between" requires value2`);
    }
    return `${column} BETWEEN ${bind(requireValue(filter))} AND ${bind(upper)}`;
  },
  is_null: column => `${column} IS NULL`,
  is_not_null: column => `${column} IS NOT NULL`,
  starts_with: (column, filter, bind) => `${column} LIKE ${bind(`${requireValue(filter)}%`)}`,
  ends_with: (column, filter, bind) => `${column} LIKE ${bind(`%${requireValue(filter)}`)}`,
};

function compileFilter(filter: FilterClause, bind: Bind): string {
  const operator: string = filter.operator;
  if (!isFilterOperator(operator)) {
    throw new QueryBuildError(`Unknown filter operator "${operator}"`);
  }
  return OPERATORS[operator](quoteReference(filter.column), filter, bind);
}

function requireValue(filter: FilterClause): FilterValue {
  const value = presentValue(filter.value);
  if (value === undefined) {
    throw new QueryBuildError(`Filter on ${filter.column}: operator "${filter.operator}" requires a value`);
  }
  return value;
}

/**
 * `in` / `not_in` take a comma-delimited list.
 */
function splitList(filter: FilterClause): string[] {
  const items = String(requireValue(filter))
    .split(',')
    .map(item => item.trim())
    .filter(item => item.length > 0);
  if (items.length === 0) {
    throw new QueryBuildError(`Filter on ${filter.column}: operator "${filter.operator}" requires at least one value`);
  }
  return items;
}

// === Ordering ===

function compileOrderBy(catalog: SchemaCatalog, config: ReportConfig): string | undefined {
  if (config.orderBy) {
    // a direction written into orderBy wins over `direction`
    const written = /^(\S+)\s+(ASC|DESC)$/i.exec(config.orderBy.trim());
    if (written) return `${quoteReference(written[1])} ${written[2].toUpperCase()}`;
    return `${quoteReference(config.orderBy)} ${sqlDirection(config.direction)}`;
  }
  if (config.sorting?.column) {
    const { column, order } = config.sorting;
    const isQualified = column.includes('.') || catalog.findEnhancedColumn(config.primaryTable, column) !== undefined;
    const target = isQualified ? column : `${config.primaryTable}.${column}`;
    return `${quoteReference(target)} ${sqlDirection(order)}`;
  }
  return undefined;
}

function sqlDirection(direction: SortDirection | undefined): 'ASC' | 'DESC' {
  return direction === 'desc' ? 'DESC' : 'ASC';
}
