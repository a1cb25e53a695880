import chalk from "chalk";

// stdout carries command output (JSON/YAML); diagnostics go to stderr.
export const log = {
  warn: (msg: string) => console.error(chalk.yellow("warn"), msg),
  error: (msg: string) => console.error(chalk.red("error"), msg),
  dim: (msg: string) => console.error(chalk.dim(msg)),
  verbose: false,
  debug(msg: string) {
    if (this.verbose) console.error(chalk.magenta("debug"), msg);
  },
};

/** Print command output on stdout. */
export function output(text: string): void {
  process.stdout.write(text.endsWith("\n") ? text : `${text}\n`);
}
