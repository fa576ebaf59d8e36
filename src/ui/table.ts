import chalk from 'chalk';
import Table from 'cli-table3';
import type { ResolvedEntry } from '../types/manifest.js';
import type { TextEdit } from '../types/run.js';

export function printTable(head: string[], rows: string[][]): void {
  const table = new Table({ head, style: { head: ['cyan'] } });
  table.push(...rows);
  console.log(table.toString());
}

export function printEntries(entries: ResolvedEntry[]): void {
  printTable(
    ['Status', 'Entry', 'Found by'],
    entries.map((e) => [
      e.present ? chalk.green('present') : chalk.dim('absent'),
      e.relativePath,
      e.source === 'fixed' ? 'manifest' : 'name match',
    ]),
  );
}

export function printTextEdits(edits: TextEdit[]): void {
  printTable(
    ['Text file', 'Lines to remove'],
    edits.map((e) => [e.path, e.removedLines.join('\n')]),
  );
}
