import ExcelJS from 'exceljs';
import type { QueryResult, ResultValue } from './model';
import { ExecutionError } from './errors';

/*
 * Both formats write the header row even when the result has no rows,
 * so an empty report still tells the reader which columns it has.
 */

export interface SpreadsheetOptions {
  /** Worksheet name, truncated to 31 characters (default: `Report`) */
  readonly sheetName?: string;
}

const HEADER_FILL = 'FFD7E4BC';

/**
 * Serialize a result as RFC 4180 CSV: a header row, then one row per record.
 * @throws ExecutionError if the result is a failure
 */
export function toCsv(result: QueryResult): string {
  assertExportable(result);

  const lines = [result.columns.map(escapeCsvField).join(',')];
  for (const record of result.records) {
    lines.push(result.columns.map(column => escapeCsvField(formatCsvValue(record[column]))).join(','));
  }
  return lines.map(line => `${line}\r\n`).join('');
}

/**
 * Serialize a result as a single-sheet `.xlsx` workbook with the same rows and columns as {@link toCsv}.
 * @throws ExecutionError if the result is a failure
 */
export async function toSpreadsheet(result: QueryResult, options: SpreadsheetOptions = {}): Promise<Buffer> {
  assertExportable(result);

  const workbook = new ExcelJS.Workbook();
  const sheet = workbook.addWorksheet(sanitizeSheetName(options.sheetName ?? 'Report'));

  const header = sheet.addRow([...result.columns]);
  header.eachCell(cell => {
    cell.font = { bold: true };
    cell.fill = { type: 'pattern', pattern: 'solid', fgColor: { argb: HEADER_FILL } };
  });

  for (const record of result.records) {
    sheet.addRow(result.columns.map(column => record[column] ?? null));
  }

  return Buffer.from(await workbook.xlsx.writeBuffer());
}

function assertExportable(result: QueryResult): void {
  if (!result.success) {
    throw new ExecutionError(`Cannot export a failed query: ${result.error ?? 'unknown error'}`);
  }
}

function formatCsvValue(value: ResultValue | undefined): string {
  if (value === null || value === undefined) return '';
  return String(value);
}

function escapeCsvField(field: string): string {
  if (/[",\r\n]/.test(field)) {
    return `"${field.replace(/"/g, '""')}"`;
  }
  return field;
}

/**
 * Excel forbids `[]:*?/\` in sheet names and caps them at 31 characters.
 */
function sanitizeSheetName(name: string): string {
  const cleaned = name.replace(/[[\]:*?/\\]/g, ' ').trim().slice(0, 31);
  return cleaned.length > 0 ? cleaned : 'Report';
}
