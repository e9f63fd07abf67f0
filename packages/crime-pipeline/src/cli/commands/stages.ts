/**
 * Single-Stage Commands
 *
 * Re-run one layer against the files on disk, e.g. to resume after fixing
 * the cause of a failed stage.
 *
 * Usage:
 *   crime-pipeline stage      raw + outcomes → staged
 *   crime-pipeline primary    staged         → primary
 *   crime-pipeline report     primary        → reporting
 */

import type { Command } from 'commander';
import type { StageResult, Table } from '../../core/types.js';
import {
  runPrimaryFromFile,
  runReportingFromFile,
  runStagingFromFiles,
} from '../../pipeline/stages.js';
import { EXIT_CODES, type CLIContext, type ExitCode } from '../lib/context.js';
import { formatDataTable } from '../lib/output.js';
import { withContext } from './shared.js';

export function registerStageCommands(program: Command): void {
  program
    .command('stage')
    .description('Merge incidents with outcomes and write the staged file')
    .action(withContext(executeStage));

  program
    .command('primary')
    .description('Transform the staged file into the primary file')
    .action(withContext(executePrimary));

  program
    .command('report')
    .description('Aggregate the primary file into the reporting file')
    .action(withContext(executeReport));
}

function finish(
  context: CLIContext,
  stage: string,
  result: StageResult<Table>,
  outputPath: string,
  showTable = false
): ExitCode {
  if (context.config.json) {
    console.log(
      JSON.stringify(
        result.ok
          ? { stage, ok: true, rows: result.value.rows.length, path: outputPath }
          : { stage, ok: false, error: result.error.toLogMetadata() },
        null,
        2
      )
    );
  } else if (result.ok) {
    console.log(`${stage}: wrote ${result.value.rows.length} rows to ${outputPath}`);
    if (showTable) {
      console.log('');
      console.log(formatDataTable(result.value));
    }
  } else {
    console.error(`${stage} failed (${result.error.kind}): ${result.error.message}`);
  }

  return result.ok ? EXIT_CODES.SUCCESS : EXIT_CODES.FAILURE;
}

export async function executeStage(context: CLIContext): Promise<ExitCode> {
  const { paths, categories } = context.config;
  const result = await runStagingFromFiles(paths.raw, paths.outcomes, {
    logger: context.logger,
    rules: categories,
    outputPath: paths.staged,
  });
  return finish(context, 'stage', result, paths.staged);
}

export async function executePrimary(context: CLIContext): Promise<ExitCode> {
  const { paths } = context.config;
  const result = await runPrimaryFromFile(paths.staged, {
    logger: context.logger,
    outputPath: paths.primary,
  });
  return finish(context, 'primary', result, paths.primary);
}

export async function executeReport(context: CLIContext): Promise<ExitCode> {
  const { paths } = context.config;
  const result = await runReportingFromFile(paths.primary, {
    logger: context.logger,
    outputPath: paths.reporting,
  });
  return finish(context, 'report', result, paths.reporting, true);
}
