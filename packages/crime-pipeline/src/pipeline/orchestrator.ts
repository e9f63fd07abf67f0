/**
 * Pipeline Orchestrator
 *
 * Sequences the layers:
 *   ingest(raw) + ingest(outcomes) → staging → primary → reporting
 *
 * Tables are handed forward in memory. Staged and primary results are
 * written as checkpoints when `checkpoints` is on; the reporting file is
 * always written.
 *
 * OUTCOMES:
 * - `skipped`: an input could not be ingested; nothing downstream ran
 * - `failed`: a stage failed, or something escaped a stage (CriticalFailure)
 * - `completed`: all three files written
 *
 * `run()` never rejects.
 */

import { criticalFailure, type PipelineError } from '../core/errors.js';
import type { OutcomeCategoryRule, StageName, StageResult, Table } from '../core/types.js';
import { logger as defaultLogger, type Logger } from '../core/utils/logger.js';
import { ingest } from '../ingestion/ingestor.js';
import { DEFAULT_OUTCOME_CATEGORY_RULES } from '../transformation/outcome-categories.js';
import { runPrimary, runReporting, runStaging } from './stages.js';

// ============================================================================
// Types
// ============================================================================

/**
 * File locations for one run
 */
export interface PipelinePaths {
  readonly raw: string;
  readonly outcomes: string;
  readonly staged: string;
  readonly primary: string;
  readonly reporting: string;
}

export interface PipelineOptions {
  readonly paths: PipelinePaths;
  /** Write staged and primary checkpoints (default: true) */
  readonly checkpoints?: boolean;
  readonly rules?: readonly OutcomeCategoryRule[];
  readonly logger?: Logger;
}

export type PipelineStatus = 'completed' | 'skipped' | 'failed';

/**
 * Outcome of one stage within a run
 */
export interface StageReport {
  readonly stage: StageName;
  readonly ok: boolean;
  readonly rows?: number;
  /** Input read (ingest) or checkpoint written (other stages) */
  readonly path?: string;
  readonly error?: PipelineError;
}

export interface PipelineRunResult {
  readonly status: PipelineStatus;
  readonly stages: readonly StageReport[];
  readonly error?: PipelineError;
  readonly durationMs: number;
}

// ============================================================================
// Orchestrator
// ============================================================================

export class PipelineOrchestrator {
  private readonly paths: PipelinePaths;
  private readonly checkpoints: boolean;
  private readonly rules: readonly OutcomeCategoryRule[];
  private readonly log: Logger;

  constructor(options: PipelineOptions) {
    this.paths = options.paths;
    this.checkpoints = options.checkpoints ?? true;
    this.rules = options.rules ?? DEFAULT_OUTCOME_CATEGORY_RULES;
    this.log = options.logger ?? defaultLogger;
  }

  /**
   * Execute the full pipeline
   */
  async run(): Promise<PipelineRunResult> {
    const startTime = Date.now();
    const stages: StageReport[] = [];

    const finish = (status: PipelineStatus, error?: PipelineError): PipelineRunResult => ({
      status,
      stages,
      ...(error && { error }),
      durationMs: Date.now() - startTime,
    });

    try {
      this.log.info('Pipeline execution started', {
        checkpoints: this.checkpoints,
        raw: this.paths.raw,
        outcomes: this.paths.outcomes,
      });

      const incidents = await ingest(this.paths.raw, { logger: this.log });
      stages.push(report('ingest', incidents, this.paths.raw));
      const outcomes = await ingest(this.paths.outcomes, { logger: this.log });
      stages.push(report('ingest', outcomes, this.paths.outcomes));

      if (!incidents.ok || !outcomes.ok) {
        this.log.info('Pipeline execution completed', {
          status: 'skipped',
          reason: 'input could not be ingested',
        });
        return finish('skipped', !incidents.ok ? incidents.error : outcomes.ok ? undefined : outcomes.error);
      }

      const staged = await runStaging(incidents.value, outcomes.value, {
        logger: this.log,
        rules: this.rules,
        outputPath: this.checkpointPath(this.paths.staged),
      });
      stages.push(report('stage', staged, this.checkpointPath(this.paths.staged)));
      if (!staged.ok) return this.abort(finish, staged.error);

      const primary = await runPrimary(staged.value, {
        logger: this.log,
        outputPath: this.checkpointPath(this.paths.primary),
      });
      stages.push(report('primary', primary, this.checkpointPath(this.paths.primary)));
      if (!primary.ok) return this.abort(finish, primary.error);

      const reporting = await runReporting(primary.value, {
        logger: this.log,
        outputPath: this.paths.reporting,
      });
      stages.push(report('reporting', reporting, this.paths.reporting));
      if (!reporting.ok) return this.abort(finish, reporting.error);

      const result = finish('completed');
      this.log.info('Pipeline execution completed successfully', {
        duration_ms: result.durationMs,
        reportingRows: reporting.value.rows.length,
      });
      return result;
    } catch (error) {
      const failure = criticalFailure(error);
      this.log.critical(failure.message);
      return finish('failed', failure);
    }
  }

  private checkpointPath(path: string): string | undefined {
    return this.checkpoints ? path : undefined;
  }

  private abort(
    finish: (status: PipelineStatus, error?: PipelineError) => PipelineRunResult,
    error: PipelineError
  ): PipelineRunResult {
    this.log.error('Pipeline execution stopped', error.toLogMetadata());
    return finish('failed', error);
  }
}

function report<T extends Table>(
  stage: StageName,
  result: StageResult<T>,
  path: string | undefined
): StageReport {
  const location = path === undefined ? {} : { path };
  return result.ok
    ? { stage, ok: true, rows: result.value.rows.length, ...location }
    : { stage, ok: false, error: result.error, ...location };
}

/**
 * Convenience wrapper: build an orchestrator and run it
 */
export function runPipeline(options: PipelineOptions): Promise<PipelineRunResult> {
  return new PipelineOrchestrator(options).run();
}
