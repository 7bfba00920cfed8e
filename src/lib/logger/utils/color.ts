import chalk from 'chalk';
import type { LogType } from '../types';

type ColoredType = Exclude<LogType, 'raw'>;

const palette: Record<ColoredType, (text: string) => string> = {
  error: chalk.red,
  warn: chalk.yellow,
  notice: chalk.blue,
  success: chalk.green,
  info: chalk.white,
  debug: chalk.gray,
};

export function colorize(type: ColoredType, text: string): string {
  return palette[type](text);
}
