import { PGlite } from '@electric-sql/pglite';
import type { ColumnInfo, ForeignKeyRef, TableSchema } from './model';
import { SchemaCatalog, type CatalogOptions } from './schemaCatalog';

/**
 * Work order schema shared by the tests: two lookup tables, one table with
 * foreign keys into both (two of them into `users`), and a migration table.
 */
export const FIXTURE_SQL = `
  CREATE TABLE statuses (
    id SERIAL PRIMARY KEY,
    name TEXT NOT NULL,
    color TEXT
  );
  CREATE TABLE users (
    id SERIAL PRIMARY KEY,
    username TEXT NOT NULL,
    email TEXT
  );
  CREATE TABLE workorders (
    id SERIAL PRIMARY KEY,
    title TEXT NOT NULL,
    priority TEXT,
    status_id INTEGER REFERENCES statuses(id),
    assigned_to_id INTEGER REFERENCES users(id),
    created_by_id INTEGER NOT NULL REFERENCES users(id),
    created_at DATE
  );
  CREATE TABLE alembic_version (version_num TEXT PRIMARY KEY);

  INSERT INTO statuses (id, name, color) VALUES
    (1, 'Open', 'green'),
    (2, 'Closed', 'grey');
  INSERT INTO users (id, username, email) VALUES
    (1, 'alice', 'alice@example.com'),
    (2, 'bob', NULL);
  INSERT INTO workorders (id, title, priority, status_id, assigned_to_id, created_by_id, created_at) VALUES
    (1, 'Replace rotor', 'HIGH', 1, 2, 1, '2024-01-05'),
    (2, 'Inspect frame', 'LOW', 2, NULL, 1, '2024-02-10'),
    (3, 'Calibrate sensors', 'HIGH', 1, 1, 2, '2024-03-15');
`;

export async function createFixtureDb(): Promise<PGlite> {
  const db = new PGlite();
  await db.exec(FIXTURE_SQL);
  return db;
}

type ColumnSpec = [name: string, type: string, nullable: boolean];

function table(name: string, columns: ColumnSpec[], foreignKeys: ForeignKeyRef[] = []): TableSchema {
  const infos: ColumnInfo[] = columns.map(([columnName, type, nullable]) => ({
    name: columnName,
    type,
    nullable,
    isPrimaryKey: columnName === 'id',
  }));
  return { name, columns: new Map(infos.map(c => [c.name, c])), foreignKeys };
}

/**
 * The catalog introspection produces for {@link FIXTURE_SQL}, built without a database.
 */
export function fixtureCatalog(options: CatalogOptions = {}): SchemaCatalog {
  return SchemaCatalog.fromTables([
    table('statuses', [['id', 'int4', false], ['name', 'text', false], ['color', 'text', true]]),
    table('users', [['id', 'int4', false], ['username', 'text', false], ['email', 'text', true]]),
    table(
      'workorders',
      [
        ['id', 'int4', false],
        ['title', 'text', false],
        ['priority', 'text', true],
        ['status_id', 'int4', true],
        ['assigned_to_id', 'int4', true],
        ['created_by_id', 'int4', false],
        ['created_at', 'date', true],
      ],
      [
        { localColumn: 'status_id', referencedTable: 'statuses', referencedColumn: 'id' },
        { localColumn: 'assigned_to_id', referencedTable: 'users', referencedColumn: 'id' },
        { localColumn: 'created_by_id', referencedTable: 'users', referencedColumn: 'id' },
      ]
    ),
  ], options);
}

/**
 * Minimal RFC 4180 reader for checking exported CSV.
 */
export function parseCsv(text: string): string[][] {
  const rows: string[][] = [];
  let row: string[] = [];
  let field = '';
  let quoted = false;

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (quoted) {
      if (ch === '"' && text[i + 1] === '"') {
        field += '"';
        i++;
      } else if (ch === '"') {
        quoted = false;
      } else {
        field += ch;
      }
    } else if (ch === '"') {
      quoted = true;
    } else if (ch === ',') {
      row.push(field);
      field = '';
    } else if (ch === '\r' && text[i + 1] === '\n') {
      row.push(field);
      rows.push(row);
      row = [];
      field = '';
      i++;
    } else {
      field += ch;
    }
  }

  if (field.length > 0 || row.length > 0) {
    row.push(field);
    rows.push(row);
  }
  return rows;
}
