// src/services/CsvWriter.ts
import * as fs from 'fs';
import * as path from 'path';
import { FieldMap } from '../config/field-map';
import { MetadataRow, PatentRecord } from '../types/patent.types';
import { FileHelpers } from '../utils/file-helpers';

export function escapeCsv(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

export function toCsvLine(values: readonly string[]): string {
  return values.map(escapeCsv).join(',');
}

/**
 * Flatten a record into the field map's column order, joining multi-valued
 * fields with `separator`, and append the source file column
 */
export function toMetadataRow(record: PatentRecord, fieldMap: FieldMap, separator: string): MetadataRow {
  const row = fieldMap.rules.map(rule => {
    const value = record[rule.key];
    return Array.isArray(value) ? value.join(separator) : value;
  });
  row.push(record.sourceFile);
  return row;
}

/**
 * Header line plus one line per row, '\n'-terminated
 */
export function renderCsv(columns: readonly string[], rows: readonly MetadataRow[]): string {
  const lines = [toCsvLine(columns)];

  rows.forEach((row, index) => {
    if (row.length !== columns.length) {
      throw new Error(`Row ${index + 1} has ${row.length} cells, expected ${columns.length}`);
    }
    lines.push(toCsvLine(row));
  });

  return lines.join('\n') + '\n';
}

export function writeCsv(filePath: string, columns: readonly string[], rows: readonly MetadataRow[]): void {
  FileHelpers.ensureDirectory(path.dirname(filePath));
  fs.writeFileSync(filePath, renderCsv(columns, rows), 'utf-8');
}
