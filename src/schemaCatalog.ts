import type { EnhancedColumn, ForeignKeyRef, TableSchema } from './model';
import { toDisplayName } from './model';
import type { DbClient } from './schemaExtractor';
import { extractTableNames, extractTableSchema } from './schemaExtractor';
import { ReportError, UnknownTableError, errorMessage } from './errors';

/**
 * Referenced table -> columns of that table exposed on every table that points at it.
 */
export type LookupTableMap = Readonly<Record<string, readonly string[]>>;

export const DEFAULT_LOOKUP_TABLES: LookupTableMap = {
  statuses: ['name', 'color'],
  priorities: ['name', 'level'],
  users: ['username', 'email', 'full_name'],
};

/** Migration and ORM bookkeeping tables */
export const DEFAULT_EXCLUDED_PREFIXES: readonly string[] = [
  'alembic_',
  'knex_',
  '_prisma_',
  'flyway_',
  'schema_migrations',
];

export interface CatalogOptions {
  /** PostgreSQL schema to introspect (default: `public`) */
  readonly schemaName?: string;
  readonly excludedPrefixes?: readonly string[];
  readonly lookupTables?: LookupTableMap;
  /** Overrides for the generated table display names */
  readonly displayNames?: Readonly<Record<string, string>>;
}

/**
 * Immutable snapshot of the data store's tables, columns and foreign keys.
 * `refresh()` produces a new snapshot; an existing one is never modified.
 */
export class SchemaCatalog {
  private readonly _enhancedColumns: ReadonlyMap<string, readonly EnhancedColumn[]>;

  private constructor(
    private readonly _client: DbClient | null,
    private readonly _options: CatalogOptions,
    readonly tables: ReadonlyMap<string, TableSchema>,
    readonly displayNames: ReadonlyMap<string, string>,
    /** Tables whose introspection failed, with the failure message */
    readonly introspectionErrors: ReadonlyMap<string, string>
  ) {
    const enhanced = new Map<string, readonly EnhancedColumn[]>();
    for (const table of tables.values()) {
      enhanced.set(table.name, this._deriveEnhancedColumns(table));
    }
    this._enhancedColumns = enhanced;
  }

  /**
   * Build a catalog by introspecting the database.
   * A table that cannot be introspected gets an empty entry instead of failing the build.
   */
  static async introspect(client: DbClient, options: CatalogOptions = {}): Promise<SchemaCatalog> {
    const schemaName = options.schemaName ?? 'public';
    const excluded = options.excludedPrefixes ?? DEFAULT_EXCLUDED_PREFIXES;

    const names = (await extractTableNames(client, schemaName))
      .filter(name => !excluded.some(prefix => name.startsWith(prefix)));

    const tables: TableSchema[] = [];
    const errors = new Map<string, string>();

    for (const name of names) {
      try {
        tables.push(await extractTableSchema(client, schemaName, name));
      } catch (error) {
        errors.set(name, errorMessage(error));
        tables.push({ name, columns: new Map(), foreignKeys: [] });
      }
    }

    return SchemaCatalog._create(client, options, tables, errors);
  }

  /**
   * Build a catalog from already known table schemas (no database access).
   */
  static fromTables(tables: readonly TableSchema[], options: CatalogOptions = {}): SchemaCatalog {
    return SchemaCatalog._create(null, options, tables, new Map());
  }

  private static _create(
    client: DbClient | null,
    options: CatalogOptions,
    tables: readonly TableSchema[],
    errors: ReadonlyMap<string, string>
  ): SchemaCatalog {
    const displayNames = new Map<string, string>();
    for (const table of tables) {
      displayNames.set(table.name, options.displayNames?.[table.name] ?? toDisplayName(table.name));
    }
    return new SchemaCatalog(
      client,
      options,
      new Map(tables.map(t => [t.name, t])),
      displayNames,
      errors
    );
  }

  /**
   * Introspect again with the same client and options.
   */
  async refresh(): Promise<SchemaCatalog> {
    if (!this._client) {
      throw new ReportError('Cannot refresh a catalog that was not built from a database connection');
    }
    return SchemaCatalog.introspect(this._client, this._options);
  }

  hasTable(table: string): boolean {
    return this.tables.has(table);
  }

  /**
   * @throws UnknownTableError
   */
  getTable(table: string): TableSchema {
    const schema = this.tables.get(table);
    if (!schema) {
      throw new UnknownTableError(table, [...this.tables.keys()]);
    }
    return schema;
  }

  listTables(): Record<string, string> {
    return Object.fromEntries(this.displayNames);
  }

  displayName(table: string): string {
    return this.displayNames.get(table) ?? toDisplayName(table);
  }

  /**
   * Base column names of a table, in catalog order.
   */
  getColumns(table: string): string[] {
    return [...this.getTable(table).columns.keys()];
  }

  /**
   * Base columns followed by the columns reachable through foreign keys to lookup tables.
   */
  getEnhancedColumns(table: string): readonly EnhancedColumn[] {
    this.getTable(table);
    return this._enhancedColumns.get(table) ?? [];
  }

  /**
   * Find a foreign-key-derived column by its name (`status_name`)
   * or its qualified expression (`statuses.name`).
   */
  findEnhancedColumn(table: string, name: string): EnhancedColumn | undefined {
    return this.getEnhancedColumns(table).find(
      c => c.join !== null && (c.name === name || c.expression === name)
    );
  }

  private _deriveEnhancedColumns(table: TableSchema): EnhancedColumn[] {
    const result: EnhancedColumn[] = [...table.columns.values()].map(column => ({
      name: column.name,
      displayName: toDisplayName(column.name),
      type: column.type,
      expression: `${table.name}.${column.name}`,
      join: null,
    }));

    const lookupTables = this._options.lookupTables ?? DEFAULT_LOOKUP_TABLES;
    const lookupKeys = table.foreignKeys.filter(
      fk => fk.referencedTable in lookupTables && this.tables.has(fk.referencedTable)
    );

    const refCounts = new Map<string, number>();
    for (const fk of lookupKeys) {
      refCounts.set(fk.referencedTable, (refCounts.get(fk.referencedTable) ?? 0) + 1);
    }

    const taken = new Set(result.map(c => c.name));

    for (const fk of lookupKeys) {
      const target = this.tables.get(fk.referencedTable);
      if (!target) continue;

      const prefix = foreignKeyPrefix(fk);
      const needsAlias = (refCounts.get(fk.referencedTable) ?? 0) > 1 || fk.referencedTable === table.name;
      const alias = needsAlias ? prefix : undefined;
      const reference = alias ?? fk.referencedTable;

      for (const projected of lookupTables[fk.referencedTable]) {
        const targetColumn = target.columns.get(projected);
        const name = `${prefix}_${projected}`;
        if (!targetColumn || taken.has(name)) continue;

        taken.add(name);
        result.push({
          name,
          displayName: `${toDisplayName(prefix)} ${toDisplayName(projected)}`,
          type: targetColumn.type,
          expression: `${reference}.${projected}`,
          join: {
            targetTable: fk.referencedTable,
            alias,
            localKey: fk.localColumn,
            foreignKey: fk.referencedColumn,
            displayName: this.displayName(fk.referencedTable),
          },
        });
      }
    }

    return result;
  }
}

/**
 * `status_id` -> `status`
 */
function foreignKeyPrefix(fk: ForeignKeyRef): string {
  const stripped = fk.localColumn.replace(/_id$/, '');
  return stripped.length > 0 ? stripped : fk.localColumn;
}
