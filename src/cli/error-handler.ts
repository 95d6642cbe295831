/**
 * Error Handler - Consistent error reporting for CLI commands
 */

import chalk from "chalk";

import { isMemoryLayerError, ValidationError, type ErrorCode } from "../errors.js";

const ERROR_MESSAGES: Record<ErrorCode, { title: string; help: string }> = {
  VALIDATION_ERROR: {
    title: "Validation Error",
    help: "Check the command arguments and try again.",
  },
  NOT_FOUND: {
    title: "Not Found",
    help: "Check the id; 'convo sessions list --user <id>' shows a user's sessions.",
  },
  INVALID_TRANSITION: {
    title: "Invalid Transition",
    help: "Session status only moves forward: active, completed, archived.",
  },
  CONCURRENCY_CONFLICT: {
    title: "Write Conflict",
    help: "Another writer held the database. Try again.",
  },
  EXTERNAL_INVOCATION_ERROR: {
    title: "Model Error",
    help: "The model call failed or timed out.",
  },
  CONFIG_ERROR: {
    title: "Configuration Error",
    help: "Check your convo.config.json file for issues.",
  },
};

export function formatError(err: unknown, verbose = false): string {
  const lines: string[] = [];

  if (isMemoryLayerError(err)) {
    const meta = ERROR_MESSAGES[err.code];
    lines.push(chalk.red.bold(`${meta.title}: `) + err.message);
    lines.push(chalk.dim(`Hint: ${meta.help}`));

    if (verbose && err.details) {
      lines.push(chalk.dim("\nDetails:"));
      lines.push(chalk.dim(JSON.stringify(err.details, null, 2)));
    }
  } else if (err instanceof Error) {
    lines.push(chalk.red.bold("Error: ") + err.message);

    if (verbose && err.stack) {
      lines.push(chalk.dim("\nStack trace:"));
      lines.push(chalk.dim(err.stack));
    }
  } else {
    lines.push(chalk.red.bold("Error: ") + String(err));
  }

  return lines.join("\n");
}

/**
 * Wrap an async command handler: report the error and set a failing exit code.
 */
export function withErrorHandling<T extends unknown[], R>(
  fn: (...args: T) => Promise<R>,
  options: { verbose?: boolean } = {},
): (...args: T) => Promise<R | undefined> {
  return async (...args: T): Promise<R | undefined> => {
    try {
      return await fn(...args);
    } catch (err) {
      console.error(formatError(err, options.verbose));
      process.exitCode = 1;
      return undefined;
    }
  };
}

export function parseNumberArg(value: string | undefined, name: string): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new ValidationError(`${name} must be a number`, { [name]: value });
  }
  return parsed;
}
