/**
 * Command Registration
 *
 * - run: full pipeline
 * - stage / primary / report: one layer against files on disk
 * - categorize: classify outcome labels
 */

import type { Command } from 'commander';
import { registerCategorizeCommand } from './categorize.js';
import { registerRunCommand } from './run.js';
import { registerStageCommands } from './stages.js';

export function registerCommands(program: Command): void {
  registerRunCommand(program);
  registerStageCommands(program);
  registerCategorizeCommand(program);
}

export { executeRun } from './run.js';
export { executeStage, executePrimary, executeReport } from './stages.js';
export { executeCategorize } from './categorize.js';
