import chalk from "chalk";

/** Shared terminal palette for the progress narrative. */
export const theme = {
  heading: (text: string) => chalk.bold(text),
  success: (text: string) => chalk.green(text),
  warn: (text: string) => chalk.yellow(text),
  error: (text: string) => chalk.red(text),
  muted: (text: string) => chalk.gray(text),
  command: (text: string) => chalk.cyan(text),
  path: (text: string) => chalk.magenta(text),
};

export const RULE = "========================================================";
