/**
 * Error Handler - terminal diagnostics for fatal errors
 */

import chalk from "chalk";

import { BridgeError, type BridgeErrorCode } from "../errors.js";

/**
 * Error codes with user-friendly titles
 */
const ERROR_MESSAGES: Record<BridgeErrorCode, { title: string; help: string }> = {
  CONFIG_ERROR: {
    title: "Configuration Error",
    help: "Check the command-line flags, the config file and the TLS files they name.",
  },
  DIAL_ERROR: {
    title: "Connection Error",
    help: "Check the target and collector addresses and that both are reachable.",
  },
  STREAM_ERROR: {
    title: "Stream Error",
    help: "The target or collector closed a stream; the bridge retries these on its own.",
  },
  CANCELLED: {
    title: "Cancelled",
    help: "The bridge was stopped.",
  },
};

/**
 * Format an error for display
 */
export function formatError(err: unknown, verbose = false): string {
  const lines: string[] = [];

  if (err instanceof BridgeError) {
    const meta = ERROR_MESSAGES[err.code];
    lines.push(chalk.red.bold(`${meta.title}: `) + err.message);

    if (err.suggestion) {
      lines.push(chalk.yellow("Suggestion: ") + err.suggestion);
    } else {
      lines.push(chalk.dim(`Hint: ${meta.help}`));
    }
  } else if (err instanceof Error) {
    lines.push(chalk.red.bold("Error: ") + err.message);
  } else {
    lines.push(chalk.red.bold("Error: ") + String(err));
  }

  if (verbose && err instanceof Error && err.stack) {
    lines.push(chalk.dim("\nStack trace:"));
    lines.push(chalk.dim(err.stack));
  }

  return lines.join("\n");
}

/**
 * Wrap an async command handler with error handling
 */
export function withErrorHandling<T extends unknown[], R>(
  fn: (...args: T) => Promise<R>,
  options: { verbose?: boolean; write?: (text: string) => void } = {},
): (...args: T) => Promise<R | undefined> {
  const write = options.write ?? ((text: string) => console.error(text));
  return async (...args: T): Promise<R | undefined> => {
    try {
      return await fn(...args);
    } catch (err) {
      write(formatError(err, options.verbose));
      process.exitCode = 1;
      return undefined;
    }
  };
}
