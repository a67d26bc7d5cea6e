/**
 * Terminal output for the recon commands
 */

import chalk from 'chalk';
import { LABEL_VENDORS, NON_LABEL_VENDORS, UNKNOWN_LABEL } from '@unshipped/shared';

const LABEL_WIDTH = 20;

export function heading(text: string): void {
  console.log(`\n${chalk.bold.cyan(text)}`);
}

export function field(label: string, value: string | number): void {
  console.log(`  ${chalk.gray(label.padEnd(LABEL_WIDTH))} ${value}`);
}

export function success(text: string): void {
  console.log(chalk.green(`✓ ${text}`));
}

export function error(text: string): void {
  console.error(chalk.red(`✗ ${text}`));
}

export function warn(text: string): void {
  console.log(chalk.yellow(`! ${text}`));
}

export function labelColor(label: string): string {
  if (label === LABEL_VENDORS) return chalk.green(label);
  if (label === NON_LABEL_VENDORS) return chalk.blue(label);
  if (label === UNKNOWN_LABEL) return chalk.yellow(label);
  return label;
}

export function json(data: unknown): void {
  console.log(JSON.stringify(data, null, 2));
}

/** Header + rows, the same shape the report sheets use; columns padded to their widest cell */
export function table(header: readonly string[], rows: readonly (readonly (string | number)[])[]): void {
  if (rows.length === 0) {
    console.log(chalk.dim('  (none)'));
    return;
  }

  const widths = header.map((title, i) => Math.max(title.length, ...rows.map((row) => String(row[i] ?? '').length)));
  const render = (cells: readonly (string | number)[]) =>
    widths.map((width, i) => String(cells[i] ?? '').padEnd(width)).join('  ').trimEnd();

  console.log(chalk.bold(`  ${render(header)}`));
  for (const row of rows) console.log(`  ${render(row)}`);
}
