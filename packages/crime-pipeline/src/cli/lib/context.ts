/**
 * CLI context: resolved configuration plus the process-wide logger
 *
 * @module cli/lib/context
 */

import { createLogger, type Logger } from '../../core/utils/logger.js';
import { loadConfig, type LoadConfigOptions, type PipelineConfig } from './config.js';

export const EXIT_CODES = {
  SUCCESS: 0,
  FAILURE: 1,
  CONFIG_ERROR: 3,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

export interface CLIContext {
  readonly config: PipelineConfig;
  readonly logger: Logger;
}

/**
 * Global options as commander hands them to actions
 */
export interface GlobalOptions {
  readonly config?: string;
  readonly dataDir?: string;
  readonly verbose?: boolean;
  readonly json?: boolean;
  readonly checkpoints?: boolean;
}

/**
 * Build the context for one command invocation
 *
 * @throws ConfigError on a missing or invalid config file
 */
export function createContext(
  options: GlobalOptions,
  loadOptions: Omit<LoadConfigOptions, 'configPath' | 'overrides'> = {}
): CLIContext {
  const config = loadConfig({
    ...loadOptions,
    configPath: options.config,
    overrides: {
      dataDir: options.dataDir,
      checkpoints: options.checkpoints,
      verbose: options.verbose,
      json: options.json,
    },
  });

  const logger = createLogger({
    level: config.verbose ? 'debug' : 'info',
    pretty: !config.json,
    logFile: config.logFile,
    // JSON mode keeps stdout for the result document
    silent: config.json,
  });

  return { config, logger };
}
