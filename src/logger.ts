import chalk from 'chalk';
import { Logger } from './types/index.js';

/**
 * Console logger used by the CLI. Components take a `Logger` so tests can
 * swap in a recording one.
 */
export class ConsoleLogger implements Logger {
  constructor(private readonly verbose: boolean = false) {}

  info(message: string): void {
    console.log(message);
  }

  step(message: string): void {
    console.log(chalk.blue(message));
  }

  success(message: string): void {
    console.log(chalk.green(`✓ ${message}`));
  }

  warn(message: string): void {
    console.warn(chalk.yellow(`⚠ ${message}`));
  }

  error(message: string): void {
    console.error(chalk.red(`❌ ${message}`));
  }

  detail(message: string): void {
    if (this.verbose) {
      console.log(chalk.gray(message));
    }
  }
}

export const silentLogger: Logger = {
  info: () => undefined,
  step: () => undefined,
  success: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  detail: () => undefined
};
