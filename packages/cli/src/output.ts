/**
 * Terminal rendering. Human output is a projection of the same data the
 * --json flag prints, so both always carry the same values.
 */

import pc from 'picocolors';

export interface Column<T> {
  header: string;
  value: (row: T) => string | number | boolean | null | undefined;
}

function cell(value: string | number | boolean | null | undefined): string {
  if (value === null || value === undefined) return '-';
  if (typeof value === 'boolean') return value ? 'yes' : 'no';
  return String(value);
}

export function printJson(data: unknown): void {
  console.log(JSON.stringify(data, null, 2));
}

/**
 * Columns are padded to their widest cell and separated by two spaces.
 */
export function printTable<T>(columns: Column<T>[], rows: T[], emptyMessage: string): void {
  if (rows.length === 0) {
    console.log(emptyMessage);
    return;
  }

  const cells = rows.map((row) => columns.map((c) => cell(c.value(row))));
  const widths = columns.map((c, i) =>
    Math.max(c.header.length, ...cells.map((r) => (r[i] ?? '').length)),
  );
  const line = (values: string[]) =>
    values
      .map((v, i) => (i === values.length - 1 ? v : v.padEnd(widths[i] ?? 0)))
      .join('  ');

  console.log(line(columns.map((c) => c.header)));
  console.log('─'.repeat(widths.reduce((sum, w) => sum + w, 0) + 2 * (widths.length - 1)));
  for (const r of cells) console.log(line(r));
}

export function printDetails(
  pairs: Array<[string, string | number | boolean | null | undefined]>,
): void {
  const width = Math.max(...pairs.map(([key]) => key.length)) + 1;
  for (const [key, value] of pairs) {
    console.log(`${`${key}:`.padEnd(width)}  ${cell(value)}`);
  }
}

export function success(message: string): void {
  console.log(`${pc.green('✓')} ${message}`);
}

export function failure(message: string): void {
  console.log(`${pc.red('✗')} ${message}`);
}

export function notice(message: string): void {
  console.log(`${pc.cyan('●')} ${message}`);
}

export function warn(message: string): void {
  console.error(pc.yellow(`Warning: ${message}`));
}
