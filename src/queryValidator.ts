import { parse, type Statement } from 'pgsql-ast-parser';
import type { ReportConfigDraft } from './model';
import { isFilterOperator, isJoinType, presentValue } from './model';
import { SafetyRejectionError, errorMessage } from './errors';

export interface SafetyVerdict {
  readonly isSafe: boolean;
  readonly reason: string;
}

/** Statement kinds and execution primitives a report query may never contain */
export const FORBIDDEN_KEYWORDS: readonly string[] = [
  'DROP',
  'DELETE',
  'INSERT',
  'UPDATE',
  'ALTER',
  'CREATE',
  'TRUNCATE',
  'EXEC',
  'EXECUTE',
  'DECLARE',
];

const VALUELESS_OPERATORS = new Set(['is_null', 'is_not_null']);

/** `column` or `table.column` */
const COLUMN_REFERENCE = /^[A-Za-z_][A-Za-z0-9_]*(\.[A-Za-z_][A-Za-z0-9_]*)?$/;

/** A column reference optionally followed by a sort direction */
const ORDER_REFERENCE = /^[A-Za-z_][A-Za-z0-9_]*(\.[A-Za-z_][A-Za-z0-9_]*)?(\s+(ASC|DESC))?$/i;

/**
 * Check a report configuration for missing or malformed fields.
 * Returns human-readable messages; an empty list means the config is usable.
 */
export function validateConfig(config: ReportConfigDraft): string[] {
  const errors: string[] = [];

  if (!config.primaryTable) {
    errors.push('Primary table is required');
  }

  if (!config.columns || config.columns.length === 0) {
    errors.push('At least one column is required');
  }

  (config.filters ?? []).forEach((filter, i) => {
    const label = `Filter ${i + 1}`;
    if (!filter.column) {
      errors.push(`${label} missing column`);
    } else if (!COLUMN_REFERENCE.test(filter.column)) {
      errors.push(`${label} column "${filter.column}" is not a valid column reference`);
    }

    if (!filter.operator) {
      errors.push(`${label} missing operator`);
      return;
    }
    if (!isFilterOperator(filter.operator)) {
      errors.push(`${label} has unknown operator "${filter.operator}"`);
      return;
    }

    if (!VALUELESS_OPERATORS.has(filter.operator) && presentValue(filter.value) === undefined) {
      errors.push(`${label} requires a value for operator "${filter.operator}"`);
    }

    const hasValue2 = presentValue(filter.value2) !== undefined;
    if (filter.operator === 'between' && !hasValue2) {
      errors.push(`${label} uses operator "between" and requires value2`);
    } else if (filter.operator !== 'between' && hasValue2) {
      errors.push(`${label} has value2, which is only allowed with operator "between"`);
    }
  });

  (config.joins ?? []).forEach((join, i) => {
    const label = `Join ${i + 1}`;
    if (!join.type || !isJoinType(join.type)) {
      errors.push(`${label} must have a type of INNER, LEFT, RIGHT or FULL`);
    }
    if (!join.table) {
      errors.push(`${label} missing table`);
    }
    if (!join.condition) {
      errors.push(`${label} missing condition`);
    }
  });

  for (const column of config.groupBy ?? []) {
    if (!COLUMN_REFERENCE.test(column)) {
      errors.push(`Group by "${column}" is not a valid column reference`);
    }
  }

  if (config.orderBy !== undefined && !ORDER_REFERENCE.test(config.orderBy)) {
    errors.push(`Order by "${config.orderBy}" is not a valid column reference`);
  }

  if (config.sorting) {
    if (!config.sorting.column) {
      errors.push('Sorting missing column');
    } else if (!COLUMN_REFERENCE.test(config.sorting.column)) {
      errors.push(`Sorting column "${config.sorting.column}" is not a valid column reference`);
    }
  }

  for (const direction of [config.direction, config.sorting?.order]) {
    if (direction !== undefined && direction !== 'asc' && direction !== 'desc') {
      errors.push(`Sort direction must be "asc" or "desc", got "${direction}"`);
    }
  }

  if (config.limit !== undefined && !Number.isInteger(config.limit)) {
    errors.push('Limit must be an integer');
  }

  return errors;
}

/**
 * Decide whether generated SQL may run against the data store.
 *
 * Text checks first: the statement must start with SELECT, contain no forbidden keyword
 * and no second statement after a semicolon. The statement is then parsed and accepted
 * only as a single plain SELECT reading from tables, with no subquery, function call or HAVING.
 */
export function validateQuerySafety(sql: string): SafetyVerdict {
  const text = sql.trim();

  if (text.length === 0) {
    return { isSafe: false, reason: 'Query is empty' };
  }

  if (!/^SELECT\b/i.test(text)) {
    return { isSafe: false, reason: 'Only SELECT queries are allowed' };
  }

  for (const keyword of FORBIDDEN_KEYWORDS) {
    if (new RegExp(`\\b${keyword}\\b`, 'i').test(text)) {
      return { isSafe: false, reason: `Forbidden keyword: ${keyword}` };
    }
  }

  if (/;\s*\S/.test(text)) {
    return { isSafe: false, reason: 'Multiple statements are not allowed' };
  }

  let statements: Statement[];
  try {
    statements = parse(text);
  } catch (error) {
    return { isSafe: false, reason: `Query could not be parsed: ${firstLine(errorMessage(error))}` };
  }

  return checkStatements(statements);
}

/**
 * @throws SafetyRejectionError when the query fails {@link validateQuerySafety}
 */
export function assertQuerySafe(sql: string): void {
  const verdict = validateQuerySafety(sql);
  if (!verdict.isSafe) {
    throw new SafetyRejectionError(verdict.reason);
  }
}

function checkStatements(statements: Statement[]): SafetyVerdict {
  if (statements.length !== 1) {
    return { isSafe: false, reason: 'Exactly one statement is allowed' };
  }

  const statement = statements[0];
  if (statement.type !== 'select') {
    return { isSafe: false, reason: `Only plain SELECT queries are allowed, got ${statement.type}` };
  }

  for (const source of statement.from ?? []) {
    if (source.type !== 'table') {
      return { isSafe: false, reason: 'Only tables may appear in FROM and JOIN clauses' };
    }
  }

  if (statement.having) {
    return { isSafe: false, reason: 'HAVING clauses are not allowed' };
  }

  const nested = findDisallowedNode(Object.values(statement));
  if (nested === 'call') {
    return { isSafe: false, reason: 'Function calls are not allowed' };
  }
  if (nested) {
    return { isSafe: false, reason: 'Subqueries are not allowed' };
  }

  return { isSafe: true, reason: 'Query is safe' };
}

const NESTED_STATEMENT_TYPES = new Set([
  'select', 'union', 'union all', 'values', 'with', 'with recursive', 'insert', 'update', 'delete',
]);

/**
 * Depth-first search of an AST subtree for a function call or a nested statement.
 */
function findDisallowedNode(node: unknown): string | undefined {
  if (Array.isArray(node)) {
    for (const child of node) {
      const found = findDisallowedNode(child);
      if (found) return found;
    }
    return undefined;
  }
  if (typeof node !== 'object' || node === null) {
    return undefined;
  }
  if ('type' in node && typeof node.type === 'string') {
    if (node.type === 'call' || NESTED_STATEMENT_TYPES.has(node.type)) {
      return node.type;
    }
  }
  return findDisallowedNode(Object.values(node));
}

function firstLine(message: string): string {
  return message.split('\n')[0];
}
