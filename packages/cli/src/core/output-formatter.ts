/**
 * Output Formatter - JSON, table, CSV formats
 */

import type { OutputFormat } from '../types/index.js';

type Row = Record<string, unknown>;

export const OUTPUT_FORMATS = ['table', 'json', 'csv'] as const;

export function isOutputFormat(value: unknown): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

export function formatJSON(data: unknown): string {
  return JSON.stringify(data, null, 2);
}

function isRow(value: unknown): value is Row {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Convert a value to a displayable string; nested objects become compact JSON
 */
function valueToString(value: unknown): string {
  if (value === null || value === undefined) {
    return '';
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (typeof value === 'object') {
    return JSON.stringify(value);
  }
  return String(value);
}

function detectColumns(data: readonly unknown[]): string[] {
  const first = data[0];
  return isRow(first) ? Object.keys(first) : [];
}

function cell(row: unknown, column: string): unknown {
  return isRow(row) ? row[column] : undefined;
}

/**
 * Format output as a simple table
 */
export function formatTable(data: readonly unknown[], columns?: string[]): string {
  if (data.length === 0) {
    return 'No data to display';
  }

  const detectedColumns = columns ?? detectColumns(data);
  if (detectedColumns.length === 0) {
    return formatJSON(data);
  }

  const widths = detectedColumns.map((col) =>
    Math.max(col.length, ...data.map((row) => valueToString(cell(row, col)).length))
  );
  const pad = (text: string, index: number) => text.padEnd(widths[index] ?? text.length);

  const lines: string[] = [];
  lines.push(detectedColumns.map(pad).join(' | '));
  lines.push(widths.map((width) => '-'.repeat(width)).join('-|-'));
  for (const row of data) {
    lines.push(detectedColumns.map((col, i) => pad(valueToString(cell(row, col)), i)).join(' | '));
  }

  return lines.join('\n');
}

/**
 * Format output as CSV
 */
export function formatCSV(data: readonly unknown[], columns?: string[]): string {
  if (data.length === 0) {
    return '';
  }

  const detectedColumns = columns ?? detectColumns(data);
  if (detectedColumns.length === 0) {
    return '';
  }

  const lines: string[] = [detectedColumns.join(',')];
  for (const row of data) {
    const values = detectedColumns.map((col) => {
      const str = valueToString(cell(row, col));
      if (str.includes(',') || str.includes('"') || str.includes('\n')) {
        return `"${str.replace(/"/g, '""')}"`;
      }
      return str;
    });
    lines.push(values.join(','));
  }

  return lines.join('\n');
}

/**
 * Format output based on format type
 */
export function formatOutput(data: unknown, format: OutputFormat = 'table'): string {
  if (Array.isArray(data)) {
    switch (format) {
      case 'json':
        return formatJSON(data);
      case 'csv':
        return formatCSV(data);
      case 'table':
        return formatTable(data);
    }
  }

  if (typeof data === 'object' && data !== null) {
    switch (format) {
      case 'json':
        return formatJSON(data);
      case 'csv':
        return formatCSV([data]);
      case 'table':
        return formatTable([data]);
    }
  }

  return String(data);
}
