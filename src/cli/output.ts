import chalk from 'chalk';

/**
 * Output utilities for consistent CLI formatting. Everything here goes to
 * stderr except `data`, which is reserved for exported JSON.
 */

export function data(text: string): void {
  process.stdout.write(text.endsWith('\n') ? text : `${text}\n`);
}

export function info(message: string): void {
  console.error(chalk.cyan(message));
}

export function success(message: string): void {
  console.error(chalk.green(message));
}

export function warn(message: string): void {
  console.error(chalk.yellow(message));
}

export function error(message: string): void {
  console.error(chalk.red(message));
}

export function dim(message: string): void {
  console.error(chalk.dim(message));
}

/**
 * Print a section header
 */
export function header(title: string): void {
  console.error('');
  console.error(chalk.bold.cyan(title));
  console.error(chalk.dim('='.repeat(title.length)));
}

/**
 * Print a key-value pair
 */
export function keyValue(key: string, value: string): void {
  console.error(`${chalk.dim(key + ':')} ${value}`);
}

/**
 * Print a table row
 */
export function tableRow(columns: string[], widths: number[]): void {
  const formatted = columns.map((col, i) => String(col ?? '').padEnd(widths[i] || 20));
  console.error(formatted.join('  '));
}

/**
 * Print table header
 */
export function tableHeader(columns: string[], widths: number[]): void {
  tableRow(columns, widths);
  console.error(chalk.dim('-'.repeat(widths.reduce((a, b) => a + b + 2, 0))));
}

export function blank(): void {
  console.error('');
}
