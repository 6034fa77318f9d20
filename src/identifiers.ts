import reservedWords from './reservedWords.json';

const RESERVED = new Set<string>(reservedWords);

/** Names PostgreSQL reads back unchanged without quotes */
const PLAIN_IDENTIFIER = /^[a-z_][a-z0-9_]*$/;

const REFERENCE = /^[A-Za-z_][A-Za-z0-9_]*(\.[A-Za-z_][A-Za-z0-9_]*)?$/;

/**
 * Escape a PostgreSQL identifier (table or column name).
 * Doubles any embedded double-quotes to prevent SQL injection.
 */
export function escapeIdentifier(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

/**
 * Quote an identifier only when it needs it: reserved words (`order`, `user`),
 * mixed case and anything outside `[a-z0-9_]`.
 */
export function quoteIdentifier(name: string): string {
  return PLAIN_IDENTIFIER.test(name) && !RESERVED.has(name) ? name : escapeIdentifier(name);
}

/**
 * Quote each part of a `column` or `table.column` reference.
 * Text of any other shape is returned as written.
 */
export function quoteReference(reference: string): string {
  if (!REFERENCE.test(reference)) return reference;
  return reference.split('.').map(quoteIdentifier).join('.');
}
