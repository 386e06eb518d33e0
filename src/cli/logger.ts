/**
 * Terminal output helpers for the CLI.
 */

import chalk from 'chalk';
import ora from 'ora';
import Table from 'cli-table3';
import type { Row } from '../types/models.js';
import { cellText } from '../services/formatter.js';

export function success(message: string): void {
  console.log(`${chalk.green('✔')} ${message}`);
}

/**
 * Error message, with an optional hint on the next line.
 */
export function error(message: string, suggestion?: string): void {
  console.error(`${chalk.red('✖')} ${message}`);
  if (suggestion) {
    console.error(`  ${chalk.yellow('→')} ${chalk.dim(suggestion)}`);
  }
}

export function warn(message: string): void {
  console.log(`${chalk.yellow('⚠')} ${message}`);
}

export function info(message: string): void {
  console.log(`${chalk.blue('ℹ')} ${message}`);
}

export function spinner(text: string): ReturnType<typeof ora> {
  return ora({
    text,
    color: 'cyan',
    spinner: 'dots',
  }).start();
}

/**
 * Print code block.
 */
export function code(content: string, language?: string): void {
  const border = chalk.gray('─'.repeat(50));
  console.log(border);
  if (language) {
    console.log(chalk.gray(`# ${language}`));
  }
  console.log(chalk.cyan(content));
  console.log(border);
}

export function section(title: string): void {
  console.log('');
  console.log(chalk.cyan.bold(`▶ ${title}`));
  console.log(chalk.gray('─'.repeat(50)));
}

export function newline(): void {
  console.log('');
}

/**
 * Print result rows as a table.
 */
export function rows(columns: string[], data: Row[]): void {
  const table = new Table({
    head: columns.map((col) => chalk.bold(col)),
    style: {
      head: ['cyan'],
      border: ['gray'],
    },
  });

  for (const row of data) {
    table.push(columns.map((col) => cellText(row[col])));
  }

  console.log(table.toString());
}
