import type { ColumnInfo, ForeignKeyRef, TableSchema } from './model';

/**
 * Database client interface - compatible with both pg.Client and PGlite
 */
export interface DbClient {
  query<T = unknown>(sql: string, params?: unknown[]): Promise<{
    rows: T[];
    fields?: readonly { name: string; dataTypeID?: number }[];
  }>;
}

/**
 * List the base tables of a PostgreSQL schema, sorted by name.
 */
export async function extractTableNames(client: DbClient, schemaName = 'public'): Promise<string[]> {
  const result = await client.query<{ table_name: string }>(`
    SELECT table_name
    FROM information_schema.tables
    WHERE table_schema = $1
      AND table_type = 'BASE TABLE'
    ORDER BY table_name
  `, [schemaName]);

  return result.rows.map(r => r.table_name);
}

/**
 * Extract columns, primary key and single-column foreign keys of one table.
 */
export async function extractTableSchema(client: DbClient, schemaName: string, tableName: string): Promise<TableSchema> {
  const primaryKey = new Set(await extractPrimaryKey(client, schemaName, tableName));
  const columns = await extractColumns(client, schemaName, tableName, primaryKey);
  const foreignKeys = await extractForeignKeys(client, schemaName, tableName);

  return {
    name: tableName,
    columns: new Map(columns.map(c => [c.name, c])),
    foreignKeys,
  };
}

async function extractColumns(
  client: DbClient,
  schemaName: string,
  tableName: string,
  primaryKey: ReadonlySet<string>
): Promise<ColumnInfo[]> {
  const result = await client.query<{
    column_name: string;
    udt_name: string;
    is_nullable: string;
  }>(`
    SELECT
      column_name,
      udt_name,
      is_nullable
    FROM information_schema.columns
    WHERE table_schema = $1 AND table_name = $2
    ORDER BY ordinal_position
  `, [schemaName, tableName]);

  return result.rows.map(row => ({
    name: row.column_name,
    type: row.udt_name,
    nullable: row.is_nullable === 'YES',
    isPrimaryKey: primaryKey.has(row.column_name),
  }));
}

async function extractPrimaryKey(client: DbClient, schemaName: string, tableName: string): Promise<string[]> {
  const result = await client.query<{ column_name: string }>(`
    SELECT a.attname as column_name
    FROM pg_index i
    JOIN pg_attribute a ON a.attrelid = i.indrelid AND a.attnum = ANY(i.indkey)
    JOIN pg_class c ON c.oid = i.indrelid
    JOIN pg_namespace n ON n.oid = c.relnamespace
    WHERE i.indisprimary
      AND n.nspname = $1
      AND c.relname = $2
    ORDER BY array_position(i.indkey, a.attnum)
  `, [schemaName, tableName]);

  return result.rows.map(r => r.column_name);
}

/**
 * Composite foreign keys are skipped: a lookup join needs exactly one column pair.
 */
async function extractForeignKeys(client: DbClient, schemaName: string, tableName: string): Promise<ForeignKeyRef[]> {
  const result = await client.query<{
    local_column: string;
    referenced_table: string;
    referenced_column: string;
  }>(`
    SELECT
      a.attname AS local_column,
      cl2.relname AS referenced_table,
      a2.attname AS referenced_column
    FROM pg_constraint c
    JOIN pg_class cl ON cl.oid = c.conrelid
    JOIN pg_class cl2 ON cl2.oid = c.confrelid
    JOIN pg_namespace n ON n.oid = cl.relnamespace
    JOIN pg_attribute a ON a.attrelid = c.conrelid AND a.attnum = c.conkey[1]
    JOIN pg_attribute a2 ON a2.attrelid = c.confrelid AND a2.attnum = c.confkey[1]
    WHERE c.contype = 'f'
      AND n.nspname = $1
      AND cl.relname = $2
      AND array_length(c.conkey, 1) = 1
    ORDER BY a.attnum, c.conname
  `, [schemaName, tableName]);

  return result.rows.map(row => ({
    localColumn: row.local_column,
    referencedTable: row.referenced_table,
    referencedColumn: row.referenced_column,
  }));
}
