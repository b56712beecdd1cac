import chalk from 'chalk';
import { describeError } from './errors.js';

export interface Logger {
  info(message: string): void;
  warn(message: string, error?: unknown): void;
  error(message: string, error?: unknown): void;
  debug(message: string): void;
}

function timestamp(): string {
  return chalk.gray(new Date().toISOString().slice(11, 19));
}

function withError(message: string, error?: unknown): string {
  return error === undefined ? message : `${message}: ${describeError(error)}`;
}

export function createConsoleLogger(options: { verbose?: boolean } = {}): Logger {
  return {
    info: message => console.log(`${timestamp()} ${message}`),
    warn: (message, error) => console.warn(`${timestamp()} ${chalk.yellow(withError(message, error))}`),
    error: (message, error) => console.error(`${timestamp()} ${chalk.red(withError(message, error))}`),
    debug: message => {
      if (options.verbose) {
        console.log(`${timestamp()} ${chalk.dim(message)}`);
      }
    }
  };
}

export const silentLogger: Logger = {
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  debug: () => undefined
};
