/**
 * Line prompts for the interactive session
 */

import chalk from 'chalk';
import { createInterface, type Interface } from 'node:readline';

export function createPrompt(): Interface {
  return createInterface({
    input: process.stdin,
    output: process.stdout,
  });
}

/**
 * Ask one question. An empty answer falls back to `defaultValue`.
 */
export function ask(rl: Interface, question: string, defaultValue = ''): Promise<string> {
  const hint = defaultValue ? chalk.gray(` [${defaultValue}]`) : '';
  return new Promise<string>((resolve) => {
    rl.question(`${question}${hint}: `, (answer) => {
      const trimmed = answer.trim();
      resolve(trimmed.length > 0 ? trimmed : defaultValue);
    });
  });
}

/**
 * Split a list of paths typed on one line. Paths are separated by `;`
 * so that spaces inside file names survive.
 */
export function splitPathList(input: string): string[] {
  return input
    .split(';')
    .map((part) => part.trim())
    .filter((part) => part.length > 0);
}
