export interface BarChartOptions {
  /** Length of the longest bar. Defaults to 40. */
  width?: number;
  /** Character bars are drawn with. Defaults to '#'. */
  barChar?: string;
  title?: string;
}

/**
 * Draw a horizontal bar chart of counts as text. Bars keep the order of the input and are scaled
 * so the largest count spans `width` characters.
 */
export function renderBarChart(counts: Record<string, number> | Map<string, number>, options: BarChartOptions = {}): string {
  const entries: Array<[string, number]> = counts instanceof Map ? [...counts.entries()] : Object.entries(counts);
  const width = options.width ?? 40;
  const barChar = options.barChar ?? '#';

  const lines: string[] = [];
  if (options.title) {
    lines.push(options.title);
  }
  if (entries.length === 0) {
    return lines.join('\n');
  }

  const labelWidth = Math.max(...entries.map(([label]) => label.length));
  const max = Math.max(...entries.map(([, count]) => count));

  for (const [label, count] of entries) {
    const length = max > 0 ? Math.round((count / max) * width) : 0;
    lines.push(`${label.padEnd(labelWidth)} | ${barChar.repeat(Math.max(0, length))} ${count}`);
  }
  return lines.join('\n');
}
