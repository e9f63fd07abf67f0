/**
 * Categorize Command
 *
 * Show the broad outcome category for one or more outcome labels using the
 * configured classification table.
 *
 * Usage:
 *   crime-pipeline categorize <outcome...>
 *
 * Examples:
 *   crime-pipeline categorize "Local resolution" "Under investigation"
 */

import type { Command, OptionValues } from 'commander';
import { categorizeOutcome } from '../../transformation/outcome-categories.js';
import { EXIT_CODES, type CLIContext, type ExitCode } from '../lib/context.js';
import { formatTable } from '../lib/output.js';
import { resolveContext } from './shared.js';

export function registerCategorizeCommand(program: Command): void {
  program
    .command('categorize <outcome...>')
    .description('Classify outcome labels into broad outcome categories')
    .action((outcomes: string[], _options: OptionValues, command: Command) => {
      const context = resolveContext(command);
      process.exitCode = context
        ? executeCategorize(context, outcomes)
        : EXIT_CODES.CONFIG_ERROR;
    });
}

export function executeCategorize(context: CLIContext, outcomes: readonly string[]): ExitCode {
  const rows = outcomes.map((outcome) => ({
    outcome,
    category: categorizeOutcome(outcome, context.config.categories),
  }));

  if (context.config.json) {
    console.log(JSON.stringify(rows, null, 2));
  } else {
    console.log(
      formatTable(rows, [
        { key: 'outcome', header: 'Outcome' },
        { key: 'category', header: 'Broad Outcome Category' },
      ])
    );
  }

  return EXIT_CODES.SUCCESS;
}
