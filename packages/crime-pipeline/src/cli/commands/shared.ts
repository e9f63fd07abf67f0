/**
 * Shared helpers for command actions
 */

import type { Command, OptionValues } from 'commander';
import { ConfigError } from '../lib/config.js';
import { EXIT_CODES, createContext, type CLIContext, type ExitCode, type GlobalOptions } from '../lib/context.js';

function stringOption(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

function booleanOption(value: unknown): boolean | undefined {
  return typeof value === 'boolean' ? value : undefined;
}

/**
 * Narrow commander's option bag to the global options
 *
 * `--no-checkpoints` defaults to true when absent; only an explicit false
 * is treated as an override so the config file and environment still apply.
 */
export function toGlobalOptions(values: OptionValues): GlobalOptions {
  return {
    config: stringOption(values.config),
    dataDir: stringOption(values.dataDir),
    verbose: booleanOption(values.verbose),
    json: booleanOption(values.json),
    checkpoints: values.checkpoints === false ? false : undefined,
  };
}

/**
 * Resolve the context for a command, reporting config errors
 */
export function resolveContext(command: Command): CLIContext | null {
  try {
    return createContext(toGlobalOptions(command.optsWithGlobals()));
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(`Configuration error: ${error.message}`);
      return null;
    }
    throw error;
  }
}

/**
 * Wrap a context-taking handler as a commander action for a command with
 * no positional arguments
 */
export function withContext(
  handler: (context: CLIContext) => Promise<ExitCode>
): (options: OptionValues, command: Command) => Promise<void> {
  return async (_options, command) => {
    const context = resolveContext(command);
    if (!context) {
      process.exitCode = EXIT_CODES.CONFIG_ERROR;
      return;
    }
    process.exitCode = await handler(context);
  };
}
