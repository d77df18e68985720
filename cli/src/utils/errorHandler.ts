import chalk from 'chalk';
import { ApiError, StructuredError, logger } from '@mnemy/shared';

export interface ErrorHandlerOptions {
  json?: boolean;
}

function errorType(error: unknown): string {
  if (error instanceof ApiError) return 'api_error';
  if (error instanceof StructuredError) return 'client_error';
  return 'error';
}

export function handleCommandError(
  error: unknown,
  action: string,
  options: ErrorHandlerOptions = {}
): never {
  const message = error instanceof Error ? error.message : String(error);
  const suggestions = error instanceof StructuredError ? error.getRecoverySuggestions() : [];

  logger.error(`Error ${action}`, error, { component: 'CLI' });

  if (options.json) {
    const errorResponse = {
      success: false,
      action,
      error: message,
      code: error instanceof StructuredError ? error.code : undefined,
      type: errorType(error),
      suggestions,
    };
    console.error(JSON.stringify(errorResponse));
  } else {
    console.error(chalk.red(`Error ${action}: ${message}`));
    for (const suggestion of suggestions) {
      console.error(chalk.yellow(`  - ${suggestion}`));
    }
  }
  process.exit(1);
}

export function wrapCommand<T extends unknown[]>(
  action: string,
  fn: (...args: T) => Promise<void>,
  getOptions?: (...args: T) => ErrorHandlerOptions
): (...args: T) => Promise<void> {
  return async (...args: T) => {
    try {
      await fn(...args);
    } catch (error) {
      const options = getOptions ? getOptions(...args) : {};
      handleCommandError(error, action, options);
    }
  };
}
