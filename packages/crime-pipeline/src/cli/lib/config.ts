/**
 * Crime Pipeline CLI Configuration Management
 *
 * Loads configuration from .crime-pipelinerc (YAML) with environment variable
 * overrides and defaults.
 *
 * Configuration precedence (highest to lowest):
 * 1. Command-line options
 * 2. Environment variables (CRIME_PIPELINE_*)
 * 3. Config file (.crime-pipelinerc or --config path)
 * 4. Default values
 *
 * Relative file names are resolved against the data directory.
 *
 * @module cli/lib/config
 */

import { existsSync, readFileSync } from 'node:fs';
import { isAbsolute, join, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { DEFAULT_FILE_NAMES } from '../../core/constants.js';
import type { OutcomeCategoryRule } from '../../core/types.js';
import type { PipelinePaths } from '../../pipeline/orchestrator.js';
import {
  DEFAULT_OUTCOME_CATEGORY_RULES,
  OutcomeCategoryRulesSchema,
  findOverlappingOutcomes,
} from '../../transformation/outcome-categories.js';

// ============================================================================
// Configuration Types
// ============================================================================

/**
 * Fully resolved configuration
 */
export interface PipelineConfig {
  /** Directory relative file names are resolved against */
  readonly dataDir: string;
  /** Absolute file locations */
  readonly paths: PipelinePaths;
  /** Append-only pipeline log */
  readonly logFile: string;
  /** Write staged and primary checkpoint files */
  readonly checkpoints: boolean;
  /** Ordered outcome classification table */
  readonly categories: readonly OutcomeCategoryRule[];

  // Runtime overrides (from CLI flags)
  readonly verbose: boolean;
  readonly json: boolean;
  /** Resolved config file path */
  readonly configPath: string | null;
}

/**
 * Config file structure
 */
const ConfigFileSchema = z
  .object({
    version: z.number().int().positive().optional(),
    dataDir: z.string().min(1).optional(),
    files: z
      .object({
        raw: z.string().min(1).optional(),
        outcomes: z.string().min(1).optional(),
        staged: z.string().min(1).optional(),
        primary: z.string().min(1).optional(),
        reporting: z.string().min(1).optional(),
        log: z.string().min(1).optional(),
      })
      .strict()
      .optional(),
    checkpoints: z.boolean().optional(),
    categories: OutcomeCategoryRulesSchema.optional(),
  })
  .strict();

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

// ============================================================================
// Config Loading
// ============================================================================

/**
 * Standard config file names to search for
 */
const CONFIG_FILE_NAMES = [
  '.crime-pipelinerc',
  '.crime-pipelinerc.yaml',
  '.crime-pipelinerc.yml',
  '.crime-pipelinerc.json',
];

export class ConfigError extends Error {
  public override readonly name = 'ConfigError' as const;

  constructor(message: string, public readonly configPath: string | null) {
    super(message);
    Object.setPrototypeOf(this, ConfigError.prototype);
  }
}

/**
 * Find config file in a directory or its parents
 */
export function findConfigFile(startDir: string): string | null {
  let dir = resolve(startDir);

  for (;;) {
    for (const fileName of CONFIG_FILE_NAMES) {
      const filePath = join(dir, fileName);
      if (existsSync(filePath)) {
        return filePath;
      }
    }
    const parent = resolve(dir, '..');
    if (parent === dir) return null;
    dir = parent;
  }
}

/**
 * Parse and validate config file content
 */
export function parseConfigFile(filePath: string): ConfigFile {
  const content = readFileSync(filePath, 'utf-8');

  let raw: unknown;
  try {
    // YAML is a superset of JSON, so one parser covers every file name
    raw = parseYaml(content) ?? {};
  } catch (error) {
    throw new ConfigError(
      `Invalid config file ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
      filePath
    );
  }

  const parsed = ConfigFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid config file ${filePath}: ${issues}`, filePath);
  }

  if (parsed.data.categories) {
    const overlaps = findOverlappingOutcomes(parsed.data.categories);
    if (overlaps.length > 0) {
      throw new ConfigError(
        `Invalid config file ${filePath}: outcome(s) listed under more than one category: ${overlaps.join(', ')}`,
        filePath
      );
    }
  }

  return parsed.data;
}

/**
 * Get environment variable with prefix
 */
function getEnvVar(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const value = env[`CRIME_PIPELINE_${name}`];
  return value === undefined || value === '' ? undefined : value;
}

/**
 * Get boolean environment variable
 */
function getEnvBool(env: NodeJS.ProcessEnv, name: string): boolean | undefined {
  const value = getEnvVar(env, name);
  if (value === undefined) return undefined;
  return value.toLowerCase() === 'true' || value === '1';
}

/**
 * Load configuration options
 */
export interface LoadConfigOptions {
  /** Explicit config file path */
  configPath?: string;
  /** Directory to start the config file search from (default: cwd) */
  cwd?: string;
  /** Environment (default: process.env) */
  env?: NodeJS.ProcessEnv;
  /** CLI flag overrides */
  overrides?: {
    dataDir?: string;
    checkpoints?: boolean;
    verbose?: boolean;
    json?: boolean;
  };
}

/**
 * Load and merge configuration from all sources
 *
 * @throws ConfigError when an explicit config file is missing or any config
 *   file is invalid
 */
export function loadConfig(options: LoadConfigOptions = {}): PipelineConfig {
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();

  let configPath: string | null = null;
  let fileConfig: ConfigFile = {};

  const explicitPath = options.configPath ?? getEnvVar(env, 'CONFIG');
  if (explicitPath) {
    configPath = resolve(cwd, explicitPath);
    if (!existsSync(configPath)) {
      throw new ConfigError(`Config file not found: ${configPath}`, configPath);
    }
    fileConfig = parseConfigFile(configPath);
  } else {
    configPath = findConfigFile(cwd);
    if (configPath) {
      fileConfig = parseConfigFile(configPath);
    }
  }

  const dataDir = resolve(
    cwd,
    options.overrides?.dataDir ?? getEnvVar(env, 'DATA_DIR') ?? fileConfig.dataDir ?? '.'
  );
  const inDataDir = (file: string): string => (isAbsolute(file) ? file : join(dataDir, file));
  const files = fileConfig.files ?? {};

  return {
    dataDir,
    paths: {
      raw: inDataDir(files.raw ?? DEFAULT_FILE_NAMES.raw),
      outcomes: inDataDir(files.outcomes ?? DEFAULT_FILE_NAMES.outcomes),
      staged: inDataDir(files.staged ?? DEFAULT_FILE_NAMES.staged),
      primary: inDataDir(files.primary ?? DEFAULT_FILE_NAMES.primary),
      reporting: inDataDir(files.reporting ?? DEFAULT_FILE_NAMES.reporting),
    },
    logFile: inDataDir(getEnvVar(env, 'LOG_FILE') ?? files.log ?? DEFAULT_FILE_NAMES.log),
    checkpoints:
      options.overrides?.checkpoints ??
      getEnvBool(env, 'CHECKPOINTS') ??
      fileConfig.checkpoints ??
      true,
    categories: fileConfig.categories ?? DEFAULT_OUTCOME_CATEGORY_RULES,
    verbose: options.overrides?.verbose ?? false,
    json: options.overrides?.json ?? false,
    configPath,
  };
}
