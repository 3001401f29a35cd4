import { TabularRecord, columnsOf, formatValue } from './tabular';

/**
 * Aligned plain-text table for console output, one line per record under a header and a rule.
 */
export function renderTextTable(records: ReadonlyArray<TabularRecord>, columns: string[] = columnsOf(records)): string {
  if (columns.length === 0) {
    return '';
  }
  const cells = records.map(record => columns.map(column => formatValue(record[column]).replace(/\r?\n/g, ' ')));
  const widths = columns.map((column, index) =>
    Math.max(column.length, ...cells.map(row => row[index].length))
  );
  const line = (values: string[]) => values.map((value, index) => value.padEnd(widths[index])).join('  ').trimEnd();

  return [
    line(columns),
    widths.map(width => '-'.repeat(width)).join('  '),
    ...cells.map(line)
  ].join('\n');
}
