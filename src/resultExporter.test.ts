import { describe, test, expect } from 'vitest';
import ExcelJS from 'exceljs';
import { toCsv, toSpreadsheet } from './resultExporter';
import type { QueryResult } from './model';
import { ExecutionError } from './errors';
import { parseCsv } from './testSupport';

function result(columns: string[], records: QueryResult['records']): QueryResult {
  return {
    success: true,
    records,
    columns,
    rowCount: records.length,
    executionTimeMs: 1,
    sql: 'SELECT 1',
  };
}

const failed: QueryResult = {
  success: false,
  records: [],
  columns: [],
  rowCount: 0,
  executionTimeMs: 1,
  sql: 'SELECT nope FROM workorders',
  error: 'column "nope" does not exist',
};

async function readWorkbook(buffer: Buffer) {
  const workbook = new ExcelJS.Workbook();
  await workbook.xlsx.load(buffer);
  return workbook;
}

describe('toCsv', () => {
  test('writes a header and one CRLF-terminated line per record', () => {
    const csv = toCsv(result(['id', 'title'], [
      { id: 1, title: 'Replace rotor' },
      { id: 2, title: 'Inspect frame' },
    ]));

    expect(csv).toBe('id,title\r\n1,Replace rotor\r\n2,Inspect frame\r\n');
  });

  test('quotes fields with commas, quotes or line breaks and leaves nulls empty', () => {
    const csv = toCsv(result(['id', 'title', 'note'], [
      { id: 1, title: 'Rotor, main', note: null },
      { id: 2, title: 'Say "hi"', note: 'line1\nline2' },
      { id: 3, title: 'ok', note: true },
    ]));

    expect(csv).toBe(
      'id,title,note\r\n' +
      '1,"Rotor, main",\r\n' +
      '2,"Say ""hi""","line1\nline2"\r\n' +
      '3,ok,true\r\n'
    );
  });

  test('reads back to the same columns and row count', () => {
    const source = result(['id', 'title', 'note'], [
      { id: 1, title: 'Rotor, main', note: null },
      { id: 2, title: 'Say "hi"', note: 'line1\nline2' },
    ]);

    const rows = parseCsv(toCsv(source));

    expect(rows[0]).toEqual(['id', 'title', 'note']);
    expect(rows.slice(1)).toEqual([
      ['1', 'Rotor, main', ''],
      ['2', 'Say "hi"', 'line1\nline2'],
    ]);
  });

  test('writes only the header for an empty result', () => {
    expect(toCsv(result(['id', 'title'], []))).toBe('id,title\r\n');
  });

  test('refuses a failed result', () => {
    expect(() => toCsv(failed)).toThrow(ExecutionError);
    expect(() => toCsv(failed)).toThrow('Cannot export a failed query: column "nope" does not exist');
  });
});

describe('toSpreadsheet', () => {
  test('writes a bold header row followed by the records', async () => {
    const buffer = await toSpreadsheet(result(['id', 'title', 'email'], [
      { id: 1, title: 'Replace rotor', email: 'alice@example.com' },
      { id: 2, title: 'Inspect frame', email: null },
    ]));

    const workbook = await readWorkbook(buffer);
    const sheet = workbook.worksheets[0];

    expect(workbook.worksheets).toHaveLength(1);
    expect(sheet.name).toBe('Report');
    expect(sheet.rowCount).toBe(3);
    expect([1, 2, 3].map(i => sheet.getRow(1).getCell(i).value)).toEqual(['id', 'title', 'email']);
    expect(sheet.getRow(1).getCell(1).font.bold).toBe(true);
    expect([1, 2, 3].map(i => sheet.getRow(2).getCell(i).value)).toEqual([1, 'Replace rotor', 'alice@example.com']);
    expect(sheet.getRow(3).getCell(2).value).toBe('Inspect frame');
    expect(sheet.getRow(3).getCell(3).value).toBeNull();
  });

  test('writes only the header for an empty result', async () => {
    const workbook = await readWorkbook(await toSpreadsheet(result(['id'], [])));

    expect(workbook.worksheets[0].rowCount).toBe(1);
    expect(workbook.worksheets[0].getRow(1).getCell(1).value).toBe('id');
  });

  test('cleans the sheet name', async () => {
    const workbook = await readWorkbook(await toSpreadsheet(result(['id'], []), { sheetName: 'Q1/Q2 [draft]' }));

    expect(workbook.worksheets[0].name).toBe('Q1 Q2  draft');
  });

  test('refuses a failed result', async () => {
    await expect(toSpreadsheet(failed)).rejects.toThrow(ExecutionError);
  });
});
