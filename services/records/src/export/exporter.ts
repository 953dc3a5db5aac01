import { mkdir, writeFile } from 'fs/promises';
import { join } from 'path';
import Papa from 'papaparse';
import type { ExportFormat, RecordEntity } from '../types';

export const CSV_HEADER = [
  'ID',
  'External Key',
  'Name',
  'Rights',
  'Status',
  'Remarks',
  'Created At',
  'Updated At',
];

export const CONTENT_TYPES: Record<ExportFormat, string> = {
  csv: 'text/csv; charset=utf-8',
  json: 'application/json; charset=utf-8',
};

/**
 * One header row, one row per record. Absent optional fields become empty
 * strings and timestamps are ISO-8601 UTC.
 */
export function toCsv(records: RecordEntity[]): string {
  const rows = records.map((r) => [
    r.id,
    r.externalKey,
    r.name,
    r.rights ?? '',
    r.status ?? '',
    r.remarks ?? '',
    new Date(r.createdAt).toISOString(),
    new Date(r.updatedAt).toISOString(),
  ]);
  // header travels as the first row so an empty set still yields it
  return Papa.unparse([CSV_HEADER, ...rows], { newline: '\n' });
}

export function toJson(records: RecordEntity[]): string {
  return JSON.stringify(records, null, 4);
}

export function serialize(format: ExportFormat, records: RecordEntity[]): string {
  return format === 'csv' ? toCsv(records) : toJson(records);
}

/** `records_export_YYYYMMDD_HHMMSS.<ext>` in server local time. */
export function exportFileName(format: ExportFormat, date: Date = new Date()): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `records_export_${day}_${time}.${format}`;
}

/** Writes an export artifact under `dir` and returns its path. */
export async function writeExportFile(
  dir: string,
  format: ExportFormat,
  content: string,
  date: Date = new Date(),
): Promise<string> {
  await mkdir(dir, { recursive: true });
  const filePath = join(dir, exportFileName(format, date));
  await writeFile(filePath, content, 'utf8');
  return filePath;
}
