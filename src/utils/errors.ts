import chalk from 'chalk';
import { GhostpadError } from '../lib/utils/errors.js';

export function handleError(error: unknown): void {
  if (error instanceof GhostpadError) {
    console.error(chalk.red(`\nError: ${error.message}`));

    // Provide helpful hints based on error type
    switch (error.name) {
      case 'ConfigError':
        console.error(chalk.yellow('\nCheck your config file or run: ghostpad init'));
        break;
      case 'CompletionError':
        console.error(chalk.yellow('\nCheck api_endpoint and api_key, then run: ghostpad config --check'));
        break;
      case 'FileError':
        console.error(chalk.yellow('\nCheck that the path exists and is readable.'));
        break;
    }
  } else if (error instanceof Error) {
    console.error(chalk.red(`\nError: ${error.message}`));
  } else {
    console.error(chalk.red('\nAn unexpected error occurred.'));
  }

  process.exit(1);
}

export function formatErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
