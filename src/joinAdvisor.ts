import type { JoinSuggestion } from './model';
import type { SchemaCatalog } from './schemaCatalog';

/**
 * Suggest join conditions between two tables from their foreign keys, in both directions.
 * Suggestions are advisory: the query builder never applies them on its own,
 * a caller copies the chosen one into `config.joins`.
 *
 * A key from `tableA` to `tableB` suggests INNER when the key column is NOT NULL, else LEFT.
 * A key from `tableB` back to `tableA` is one-to-many from `tableA`'s side and suggests LEFT.
 *
 * @throws UnknownTableError
 */
export function suggestJoins(catalog: SchemaCatalog, tableA: string, tableB: string): JoinSuggestion[] {
  const a = catalog.getTable(tableA);
  const b = catalog.getTable(tableB);
  const suggestions: JoinSuggestion[] = [];

  for (const fk of a.foreignKeys) {
    if (fk.referencedTable !== tableB) continue;
    const nullable = a.columns.get(fk.localColumn)?.nullable ?? true;
    suggestions.push({
      condition: `${tableA}.${fk.localColumn} = ${tableB}.${fk.referencedColumn}`,
      type: nullable ? 'LEFT' : 'INNER',
      description: `${catalog.displayName(tableA)} to ${catalog.displayName(tableB)} via ${fk.localColumn}`,
    });
  }

  if (tableA === tableB) return suggestions;

  for (const fk of b.foreignKeys) {
    if (fk.referencedTable !== tableA) continue;
    suggestions.push({
      condition: `${tableA}.${fk.referencedColumn} = ${tableB}.${fk.localColumn}`,
      type: 'LEFT',
      description: `${catalog.displayName(tableB)} referencing ${catalog.displayName(tableA)} via ${fk.localColumn}`,
    });
  }

  return suggestions;
}
