/**
 * Crime Pipeline
 *
 * Staging, primary and reporting layers for street-level crime incidents
 * and their recorded outcomes.
 *
 * @example
 * ```typescript
 * import { runPipeline } from '@crime-outcomes/pipeline';
 *
 * const result = await runPipeline({
 *   paths: {
 *     raw: './data/street.csv',
 *     outcomes: './data/outcomes.csv',
 *     staged: './data/staged.csv',
 *     primary: './data/primary.csv',
 *     reporting: './data/reporting.csv',
 *   },
 * });
 * console.log(result.status);
 * ```
 */

// Core
export * from './core/types.js';
export * from './core/errors.js';
export { COLUMNS, STAGING_DROP_COLUMNS, DEFAULT_FILE_NAMES } from './core/constants.js';
export { Logger, createLogger, logger, type LogLevel, type LoggerConfig } from './core/utils/logger.js';

// Ingestion
export { ingest, type IngestOptions } from './ingestion/ingestor.js';
export { parseCsv, formatCsv, type ParseCsvOptions } from './ingestion/csv.js';
export { writeTable } from './ingestion/writer.js';

// Transformation
export {
  categorizeOutcome,
  findOverlappingOutcomes,
  DEFAULT_OUTCOME_CATEGORY_RULES,
} from './transformation/outcome-categories.js';
export {
  stage,
  mergeOutcomes,
  deriveFinalOutcome,
  applyCategorization,
  dropColumns,
  dropStagingColumns,
} from './transformation/stager.js';
export { transformPrimary } from './transformation/primary.js';
export { aggregate, REPORTING_COLUMNS } from './transformation/reporting.js';

// Pipeline
export {
  runStaging,
  runPrimary,
  runReporting,
  runStagingFromFiles,
  runPrimaryFromFile,
  runReportingFromFile,
} from './pipeline/stages.js';
export {
  PipelineOrchestrator,
  runPipeline,
  type PipelineOptions,
  type PipelinePaths,
  type PipelineRunResult,
  type PipelineStatus,
  type StageReport,
} from './pipeline/orchestrator.js';

// Configuration
export { loadConfig, ConfigError, type PipelineConfig } from './cli/lib/config.js';
