/**
 * Run Command
 *
 * Execute the full pipeline: ingest → staging → primary → reporting.
 *
 * Usage:
 *   crime-pipeline run [options]
 *
 * Options:
 *   --no-checkpoints      Keep staged and primary tables in memory only
 *
 * Examples:
 *   crime-pipeline run
 *   crime-pipeline --data-dir ./data run --no-checkpoints
 *   crime-pipeline --json run
 */

import type { Command } from 'commander';
import { runPipeline, type PipelineRunResult } from '../../pipeline/orchestrator.js';
import { EXIT_CODES, type CLIContext, type ExitCode } from '../lib/context.js';
import { formatRunSummary, serializeRunResult } from '../lib/output.js';
import { withContext } from './shared.js';

export function registerRunCommand(program: Command): void {
  program
    .command('run')
    .description('Run the full staging → primary → reporting pipeline')
    .option('--no-checkpoints', 'Do not write staged and primary checkpoint files')
    .action(withContext(executeRun));
}

/**
 * Execute the run command
 */
export async function executeRun(context: CLIContext): Promise<ExitCode> {
  const { config, logger } = context;

  const result: PipelineRunResult = await runPipeline({
    paths: config.paths,
    checkpoints: config.checkpoints,
    rules: config.categories,
    logger,
  });

  if (config.json) {
    console.log(JSON.stringify(serializeRunResult(result), null, 2));
  } else {
    console.log(formatRunSummary(result));
  }

  return result.status === 'completed' ? EXIT_CODES.SUCCESS : EXIT_CODES.FAILURE;
}
