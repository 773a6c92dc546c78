/**
 * Conditional chalk colors
 */

import chalk from 'chalk';

import type { ColorFunctions } from './types.js';

const identity = (text: string): string => text;

/**
 * Color functions, or pass-through ones when color is disabled
 */
export function createColorFns(useColor: boolean): ColorFunctions {
  if (useColor) {
    return {
      bold: (text: string) => chalk.bold(text),
      dim: (text: string) => chalk.dim(text),
      green: (text: string) => chalk.green(text),
      red: (text: string) => chalk.red(text),
      yellow: (text: string) => chalk.yellow(text),
      cyan: (text: string) => chalk.cyan(text),
      magenta: (text: string) => chalk.magenta(text),
    };
  }
  return {
    bold: identity,
    dim: identity,
    green: identity,
    red: identity,
    yellow: identity,
    cyan: identity,
    magenta: identity,
  };
}
