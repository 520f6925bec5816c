import chalk from "chalk";

export interface Logger {
  info(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  /** Only printed with --verbose. */
  debug(message: string): void;
}

export function createConsoleLogger(verbose = false): Logger {
  return {
    info: (message) => console.log(message),
    success: (message) => console.log(chalk.green(message)),
    warn: (message) => console.warn(chalk.yellow(`Warning: ${message}`)),
    error: (message) => console.error(chalk.red(message)),
    debug: (message) => {
      if (verbose) console.log(chalk.dim(message));
    },
  };
}

export const silentLogger: Logger = {
  info: () => {},
  success: () => {},
  warn: () => {},
  error: () => {},
  debug: () => {},
};
