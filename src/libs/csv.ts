export type CsvValue = string | number | boolean | null | undefined;

export interface CsvColumn<T> {
  header: string;
  value: (row: T) => CsvValue;
}

const NEEDS_QUOTING = /[",\r\n]/;

/**
 * RFC 4180 field: quoted when it holds a comma, quote or line break, with
 * inner quotes doubled. Null and undefined become an empty field.
 */
export function escapeCsvField(value: CsvValue): string {
  if (value == null) return "";
  const text = String(value);
  return NEEDS_QUOTING.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

export function toCsv<T>(rows: readonly T[], columns: readonly CsvColumn<T>[]): string {
  const lines = [columns.map((column) => escapeCsvField(column.header)).join(",")];
  for (const row of rows) {
    lines.push(columns.map((column) => escapeCsvField(column.value(row))).join(","));
  }
  return `${lines.join("\n")}\n`;
}
