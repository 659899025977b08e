/**
 * CSV helpers for the ranked export.
 *
 * A value is quoted when it holds a comma, a quote, CR/LF, or leading or
 * trailing whitespace; quotes inside are doubled. null/undefined render empty.
 */
export type CsvValue = string | number | null | undefined;

export function escapeCsv(value: CsvValue): string {
  const s = value == null ? '' : String(value);
  const needsQuotes = /[",\r\n]/.test(s) || /^\s|\s$/.test(s);
  const body = s.replace(/"/g, '""');
  return needsQuotes ? `"${body}"` : body;
}

export function joinCsvRow(values: readonly CsvValue[]): string {
  return values.map(escapeCsv).join(',');
}

export function toCsv(header: readonly string[], rows: readonly (readonly CsvValue[])[]): string {
  return [joinCsvRow(header), ...rows.map(joinCsvRow)].join('\n') + '\n';
}
