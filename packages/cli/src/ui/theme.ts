import chalk from 'chalk';

export type Paint = (text: string) => string;

/** Styles handed to the renderer; it never reads colour settings itself */
export type Theme = {
  title: Paint;
  accent: Paint;
  selected: Paint;
  cursor: Paint;
  dim: Paint;
  info: Paint;
  success: Paint;
  error: Paint;
};

const plain: Paint = (text) => text;

export const PLAIN_THEME: Theme = {
  title: plain,
  accent: plain,
  selected: plain,
  cursor: plain,
  dim: plain,
  info: plain,
  success: plain,
  error: plain,
};

export function createTheme(options: { noColor?: boolean } = {}): Theme {
  if (options.noColor) return PLAIN_THEME;

  return {
    title: chalk.bold.cyan,
    accent: chalk.cyan,
    selected: chalk.inverse,
    cursor: chalk.inverse,
    dim: chalk.gray,
    info: chalk.blue,
    success: chalk.green,
    error: chalk.red,
  };
}
