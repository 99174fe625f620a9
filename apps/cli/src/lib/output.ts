/**
 * Output Formatter
 *
 * Consistent CLI output formatting.
 */

import chalk from 'chalk';
import type { PanelTone } from '@refmaster/mastering';

export function printSuccess(message: string): void {
  console.log(chalk.green('✓'), message);
}

export function printError(message: string): void {
  console.error(chalk.red('✗'), message);
}

export function printWarning(message: string): void {
  console.warn(chalk.yellow('!'), message);
}

export function printJson(data: unknown): void {
  console.log(JSON.stringify(data, null, 2));
}

export function printHeader(title: string): void {
  console.log();
  console.log(chalk.bold.underline(title));
  console.log();
}

export function printKeyValue(key: string, value: unknown): void {
  console.log(`  ${chalk.gray(key + ':')} ${String(value)}`);
}

/**
 * Titled block for errors the user has to read in full (tool diagnostics)
 */
export function printErrorBox(title: string, message: string): void {
  console.error();
  console.error(chalk.red.bold(title));
  for (const line of message.split('\n')) {
    console.error(chalk.red('│ ') + line);
  }
  console.error();
}

export const toneColors: Record<PanelTone, (text: string) => string> = {
  idle: chalk.gray,
  running: chalk.blue,
  success: chalk.green,
  error: chalk.red,
};

/**
 * `[##########----------]  50%`
 */
export function formatProgressBar(percent: number, width = 20): string {
  const clamped = Math.min(100, Math.max(0, percent));
  const filled = Math.round((clamped / 100) * width);
  return `[${'#'.repeat(filled)}${'-'.repeat(width - filled)}] ${String(clamped).padStart(3)}%`;
}
