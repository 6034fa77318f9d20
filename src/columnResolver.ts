import type { SchemaCatalog } from './schemaCatalog';
import { ColumnNotFoundError } from './errors';
import { quoteIdentifier, quoteReference } from './identifiers';

export interface ResolvedJoin {
  readonly table: string;
  readonly alias?: string;
  /** Column of the primary table */
  readonly localKey: string;
  /** Column of the joined table */
  readonly foreignKey: string;
}

export interface ResolvedColumns {
  /** Select-list expressions, in request order */
  readonly columns: readonly string[];
  /** Joins needed by the columns, deduplicated */
  readonly joins: readonly ResolvedJoin[];
}

/**
 * Resolve requested report columns against the catalog.
 *
 * Foreign-key-derived columns select `expression AS name` and pull in their join.
 * Anything else loses its table prefix and must be a base column of the primary table.
 * A column asked for twice, under any of its names, is selected once.
 *
 * @throws UnknownTableError if the primary table is not in the catalog
 * @throws ColumnNotFoundError for a column that matches neither
 */
export function resolveColumns(
  catalog: SchemaCatalog,
  primaryTable: string,
  requested: readonly string[]
): ResolvedColumns {
  const baseColumns = catalog.getColumns(primaryTable);
  const columns: string[] = [];
  const outputNames = new Set<string>();
  const joins = new Map<string, ResolvedJoin>();

  for (const column of requested) {
    const enhanced = catalog.findEnhancedColumn(primaryTable, column);
    if (enhanced?.join) {
      if (outputNames.has(enhanced.name)) continue;
      outputNames.add(enhanced.name);

      const { targetTable, alias, localKey, foreignKey } = enhanced.join;
      const key = `${targetTable}\u0000${localKey}\u0000${foreignKey}`;
      if (!joins.has(key)) {
        joins.set(key, { table: targetTable, alias, localKey, foreignKey });
      }
      columns.push(`${quoteReference(enhanced.expression)} AS ${quoteIdentifier(enhanced.name)}`);
      continue;
    }

    const baseName = column.includes('.') ? column.slice(column.lastIndexOf('.') + 1) : column;
    if (!baseColumns.includes(baseName)) {
      const validColumns = catalog.getEnhancedColumns(primaryTable).map(c => c.name);
      throw new ColumnNotFoundError(column, primaryTable, validColumns);
    }
    if (outputNames.has(baseName)) continue;
    outputNames.add(baseName);

    columns.push(`${quoteIdentifier(primaryTable)}.${quoteIdentifier(baseName)}`);
  }

  return { columns, joins: [...joins.values()] };
}
