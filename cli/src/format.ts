import chalk from 'chalk';
import type { LayoutPlan } from '../../src/layout/layoutPlanner';

/**
 * Terminal output formatting utilities for consistent, readable CLI output.
 */

// Box drawing characters for headers
const BOX = {
  topLeft: '╭',
  topRight: '╮',
  bottomLeft: '╰',
  bottomRight: '╯',
  horizontal: '─',
  vertical: '│'
};

/**
 * Print a section header with a box border
 */
export function printHeader(title: string, subtitle?: string): void {
  const width = Math.max(title.length, subtitle?.length || 0) + 4;
  const line = BOX.horizontal.repeat(width);

  console.log('');
  console.log(chalk.cyan(`${BOX.topLeft}${line}${BOX.topRight}`));
  console.log(chalk.cyan(`${BOX.vertical}  ${chalk.bold(title)}${' '.repeat(width - title.length - 2)}${BOX.vertical}`));
  if (subtitle) {
    console.log(chalk.cyan(`${BOX.vertical}  ${chalk.dim(subtitle)}${' '.repeat(width - subtitle.length - 2)}${BOX.vertical}`));
  }
  console.log(chalk.cyan(`${BOX.bottomLeft}${line}${BOX.bottomRight}`));
}

/**
 * Print a labeled value with consistent formatting
 */
export function printField(label: string, value: string | number, options?: { color?: 'green' | 'yellow' | 'cyan' | 'dim' }): void {
  const coloredValue = options?.color
    ? chalk[options.color](value)
    : value;
  console.log(`  ${chalk.dim(label + ':')} ${coloredValue}`);
}

/**
 * Print a list of names, wrapped after `perLine` entries
 */
export function printNameList(label: string, names: string[], perLine: number = 8): void {
  console.log(`  ${chalk.dim(label + ':')}`);
  for (let i = 0; i < names.length; i += perLine) {
    console.log(`    ${names.slice(i, i + perLine).join(', ')}`);
  }
}

/**
 * Print the grid geometry of a layout plan
 */
export function printLayout(plan: LayoutPlan): void {
  printField('Grid', `${plan.rows} × ${plan.totalColumns}`);
  printField('Panels per gene', plan.panelsPerGene);
  printField('Figure', `${plan.figure.pixels[0]} × ${plan.figure.pixels[1]} px`, { color: 'dim' });
}

/**
 * Print a success message
 */
export function printSuccess(message: string): void {
  console.log(chalk.green(`✓ ${message}`));
}

/**
 * Print an error message
 */
export function printError(message: string): void {
  console.error(chalk.red(`✗ ${message}`));
}

/**
 * Print a warning message
 */
export function printWarning(message: string): void {
  console.log(chalk.yellow(`⚠ ${message}`));
}

/**
 * Print an info message
 */
export function printInfo(message: string): void {
  console.log(chalk.cyan(`ℹ ${message}`));
}
