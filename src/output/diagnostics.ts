import chalk from 'chalk';

/** Channel for non-fatal problems; kept apart from the document output. */
export interface DiagnosticReporter {
  warn(message: string): void;
  /** Entries a directory walk left out, with the rule that dropped them. */
  excluded?(path: string, reason: string): void;
}

export const consoleReporter: DiagnosticReporter = {
  warn(message: string): void {
    console.error(chalk.yellow(message));
  },
};

export const verboseReporter: DiagnosticReporter = {
  ...consoleReporter,
  excluded(path: string, reason: string): void {
    console.error(chalk.dim(`Excluded ${path} (${reason})`));
  },
};
