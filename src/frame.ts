// src/frame.ts
import { parse } from 'csv-parse/sync';
import type { FrameRow, RowFrame } from './types.js';

const numericPattern = /^[-+]?(?:\d+\.?\d*|\.\d+)(?:[eE][-+]?\d+)?$/;

/** Header line decides the delimiter: tab, semicolon or comma */
export function detectDelimiter(headerLine: string): string {
  const counts: Array<[string, number]> = [
    ['\t', (headerLine.match(/\t/g) ?? []).length],
    [';', (headerLine.match(/;/g) ?? []).length],
    [',', (headerLine.match(/,/g) ?? []).length],
  ];
  const [best] = counts.sort((a, b) => b[1] - a[1]);
  return best && best[1] > 0 ? best[0] : ',';
}

function toStringMatrix(records: unknown): string[][] {
  if (!Array.isArray(records)) throw new Error('parser returned no records');
  return records.map((record, i) => {
    if (!Array.isArray(record)) throw new Error(`record ${i} is not a row`);
    return record.map((cell) => (typeof cell === 'string' ? cell : String(cell)));
  });
}

function buildHeaders(raw: string[]): string[] {
  return raw.map((header, index) => {
    const trimmed = header.trim();
    return trimmed ? trimmed : `Column ${index + 1}`;
  });
}

/** Decodes one uploaded export into a frame; cells stay strings, empty cells become null */
export function parseDelimited(content: Uint8Array | string): RowFrame {
  const text = typeof content === 'string' ? content : Buffer.from(content).toString('utf8');
  const firstLine = text.replace(/^\uFEFF/, '').split(/\r?\n/, 1)[0] ?? '';
  if (!firstLine.trim()) {
    throw new Error('file appears to be empty');
  }

  const matrix = toStringMatrix(
    parse(text, {
      delimiter: detectDelimiter(firstLine),
      bom: true,
      skip_empty_lines: true,
      relax_column_count: true,
      trim: true,
    })
  );

  const [headerRow, ...body] = matrix;
  const columns = buildHeaders(headerRow ?? []);
  const rows = body.map((values) => {
    const row: FrameRow = {};
    columns.forEach((column, index) => {
      const value = values[index];
      row[column] = value === undefined || value === '' ? null : value;
    });
    return row;
  });

  return { columns, rows };
}

export function hasColumn(frame: RowFrame, column: string): boolean {
  return frame.columns.includes(column);
}

export function isBlank(value: string | null | undefined): boolean {
  return value === null || value === undefined || value.trim() === '';
}

/** null for blank or non-numeric input */
export function parseNumeric(value: string | null | undefined): number | null {
  if (value === null || value === undefined) return null;
  const trimmed = value.trim();
  if (!trimmed || !numericPattern.test(trimmed)) return null;
  const n = Number(trimmed);
  return Number.isFinite(n) ? n : null;
}

/** Integer join key: "3" and "3.0" are accepted, "3.5" and "x" are not */
export function parseInteger(value: string | null | undefined): number | null {
  const n = parseNumeric(value);
  return n !== null && Number.isInteger(n) ? n : null;
}

/** Halves round away from zero */
export function roundTo(value: number, digits: number): number {
  const k = 10 ** digits;
  const r = Math.round(Math.abs(value) * k) / k;
  return value < 0 && r !== 0 ? -r : r;
}

export function columnValues(frame: RowFrame, column: string): Array<string | null> {
  return frame.rows.map((row) => row[column] ?? null);
}
