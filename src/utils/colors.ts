/**
 * Terminal colours via chalk, switched off globally by --no-color
 */

import chalk from "chalk";

let colorsEnabled = true;

export function setColorsEnabled(enabled: boolean): void {
  colorsEnabled = enabled;
}

const paint =
  (style: (text: string) => string) =>
  (text: string | number): string =>
    colorsEnabled ? style(String(text)) : String(text);

export const colors = {
  success: paint(chalk.green),
  warning: paint(chalk.yellow),
  info: paint(chalk.blue),

  dim: paint(chalk.dim),

  header: paint(chalk.cyan.bold),
  key: paint(chalk.cyan),
  value: paint(chalk.white),
};
