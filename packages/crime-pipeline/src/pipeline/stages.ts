/**
 * Pipeline Stage Steps
 *
 * Each step runs one layer's transform, optionally materializes the result
 * as a CSV checkpoint, and returns a tagged result. Nothing is thrown past
 * a step: failures are logged at error level and returned.
 *
 * The `*FromFile(s)` variants re-run a single layer against files on disk,
 * which is how a run is resumed from an intermediate checkpoint.
 */

import { toPipelineError } from '../core/errors.js';
import {
  fail,
  ok,
  type OutcomeCategoryRule,
  type PrimaryTable,
  type StageResult,
  type Table,
} from '../core/types.js';
import { logger as defaultLogger, type Logger } from '../core/utils/logger.js';
import { ingest } from '../ingestion/ingestor.js';
import { writeTable } from '../ingestion/writer.js';
import { DEFAULT_OUTCOME_CATEGORY_RULES } from '../transformation/outcome-categories.js';
import { transformPrimary } from '../transformation/primary.js';
import { aggregate } from '../transformation/reporting.js';
import { stage } from '../transformation/stager.js';

// ============================================================================
// Types
// ============================================================================

export interface StepOptions {
  readonly logger?: Logger;
  /** Write the result here; omitted means keep it in memory only */
  readonly outputPath?: string;
}

export interface StagingStepOptions extends StepOptions {
  readonly rules?: readonly OutcomeCategoryRule[];
}

/**
 * Labels used in the start / success / failure log lines of a step
 */
interface StepLabels {
  readonly name: 'stage' | 'primary' | 'reporting';
  readonly start: string;
  readonly success: string;
  readonly failure: string;
}

const STAGING: StepLabels = {
  name: 'stage',
  start: 'Starting data staging',
  success: 'Data staging completed successfully',
  failure: 'Error during data staging',
};

const PRIMARY: StepLabels = {
  name: 'primary',
  start: 'Starting primary data transformation',
  success: 'Primary data transformation completed successfully',
  failure: 'Error during primary data transformation',
};

const REPORTING: StepLabels = {
  name: 'reporting',
  start: 'Starting reporting data aggregation',
  success: 'Reporting data aggregation completed successfully',
  failure: 'Error during reporting data aggregation',
};

// ============================================================================
// Step Runner
// ============================================================================

async function runStep<T extends Table>(
  labels: StepLabels,
  transform: () => T,
  options: StepOptions
): Promise<StageResult<T>> {
  const log = options.logger ?? defaultLogger;
  log.info(labels.start);

  let result: T;
  try {
    result = transform();
  } catch (error) {
    const failure = toPipelineError(error, labels.name);
    log.error(`${labels.failure}: ${failure.message}`, failure.toLogMetadata());
    return fail(failure);
  }

  if (options.outputPath !== undefined) {
    const written = await writeTable(options.outputPath, result);
    if (!written.ok) {
      const failure = toPipelineError(written.error, labels.name);
      log.error(`${labels.failure}: ${failure.message}`, failure.toLogMetadata());
      return fail(failure);
    }
  }

  log.info(labels.success, {
    rows: result.rows.length,
    ...(options.outputPath !== undefined && { output: options.outputPath }),
  });
  return ok(result);
}

// ============================================================================
// Steps
// ============================================================================

/**
 * Staging step: merge, categorize and clean
 */
export function runStaging(
  incidents: Table,
  outcomes: Table,
  options: StagingStepOptions = {}
): Promise<StageResult<Table>> {
  const rules = options.rules ?? DEFAULT_OUTCOME_CATEGORY_RULES;
  return runStep(STAGING, () => stage(incidents, outcomes, rules), options);
}

/**
 * Primary step: categorical validation and Location Sum
 */
export function runPrimary(
  staged: Table,
  options: StepOptions = {}
): Promise<StageResult<PrimaryTable>> {
  return runStep(PRIMARY, () => transformPrimary(staged), options);
}

/**
 * Reporting step: counts per crime type and outcome category
 */
export function runReporting(
  primary: Table,
  options: StepOptions = {}
): Promise<StageResult<Table>> {
  return runStep(REPORTING, () => aggregate(primary), options);
}

// ============================================================================
// Resume From Checkpoint
// ============================================================================

export async function runStagingFromFiles(
  rawPath: string,
  outcomesPath: string,
  options: StagingStepOptions & { readonly outputPath: string }
): Promise<StageResult<Table>> {
  const incidents = await ingest(rawPath, { logger: options.logger });
  if (!incidents.ok) return incidents;
  const outcomes = await ingest(outcomesPath, { logger: options.logger });
  if (!outcomes.ok) return outcomes;
  return runStaging(incidents.value, outcomes.value, options);
}

export async function runPrimaryFromFile(
  stagedPath: string,
  options: StepOptions & { readonly outputPath: string }
): Promise<StageResult<PrimaryTable>> {
  const staged = await ingest(stagedPath, { logger: options.logger });
  if (!staged.ok) return staged;
  return runPrimary(staged.value, options);
}

export async function runReportingFromFile(
  primaryPath: string,
  options: StepOptions & { readonly outputPath: string }
): Promise<StageResult<Table>> {
  const primary = await ingest(primaryPath, { logger: options.logger });
  if (!primary.ok) return primary;
  return runReporting(primary.value, options);
}
