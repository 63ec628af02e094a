/**
 * Operator Display Utilities
 *
 * Plain console output for the slotpost CLI. Logs go to stderr, so these
 * helpers are the only thing that writes to stdout.
 */

export type StepStatus = 'pending' | 'active' | 'done' | 'error';

const BOX_WIDTH = 60;

/**
 * Print a header banner
 */
export function printHeader(title: string = 'slotpost'): void {
  const line = '─'.repeat(BOX_WIDTH - 2);
  console.log(`\n┌${line}┐`);
  console.log(`│  ${title.padEnd(BOX_WIDTH - 5)}│`);
  console.log(`└${line}┘\n`);
}

/**
 * Print a step with status indicator
 */
export function printStep(status: StepStatus, label: string, detail?: string): void {
  const icons: Record<StepStatus, string> = {
    pending: '[ ]',
    active: '[→]',
    done: '[✓]',
    error: '[✗]',
  };

  console.log(`  ${icons[status]} ${label}`);

  if (detail) {
    console.log(`      └─ ${detail}`);
  }
}

/**
 * Render rows as a left-aligned table with a dashed rule under the header.
 * Returns the lines so callers (and tests) can inspect them before printing.
 */
export function formatTable(headers: string[], rows: string[][]): string[] {
  const widths = headers.map((header, col) =>
    Math.max(header.length, ...rows.map(row => (row[col] ?? '').length))
  );
  const renderRow = (cells: string[]): string =>
    widths.map((width, col) => (cells[col] ?? '').padEnd(width)).join('  ').trimEnd();

  return [
    renderRow(headers),
    widths.map(width => '-'.repeat(width)).join('  '),
    ...rows.map(renderRow),
  ];
}

/**
 * Print an error line with optional detail
 */
export function printError(message: string, detail?: string): void {
  console.error(`\n  ✗ ${message}`);
  if (detail) {
    console.error(`    ${detail}`);
  }
}
