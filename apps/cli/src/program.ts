import { Command } from 'commander';
import type { AppConfig, Logger } from '@taskdeck/core';
import { createCliContext, type CliContext, type OpenDb } from './context.js';
import { createAddCommand } from './commands/add.js';
import { createListCommand, createSearchCommand } from './commands/list.js';
import { createGetCommand } from './commands/get.js';
import { createStatusCommand, createPriorityCommand } from './commands/status.js';
import { createUpdateCommand } from './commands/update.js';
import { createDeleteCommand } from './commands/delete.js';
import { createStatsCommand } from './commands/stats.js';
import { createServeCommand } from './commands/serve.js';

export interface CliProgram {
  program: Command;
  context: CliContext;
}

export function createProgram(config: AppConfig, logger: Logger, openDb?: OpenDb): CliProgram {
  const program = new Command()
    .name('taskdeck')
    .description('Task management from the command line')
    .version(config.appVersion)
    .option('--db <path>', 'Database file or sqlite:// URL (defaults to DATABASE_URL)');

  const context = createCliContext(
    config,
    logger,
    () => program.opts<{ db?: string }>().db,
    openDb,
  );

  program.addCommand(createServeCommand(context));
  program.addCommand(createAddCommand(context));
  // No command: show the task list
  program.addCommand(createListCommand(context), { isDefault: true });
  program.addCommand(createGetCommand(context));
  program.addCommand(createSearchCommand(context));
  program.addCommand(createStatusCommand(context));
  program.addCommand(createPriorityCommand(context));
  program.addCommand(createUpdateCommand(context));
  program.addCommand(createDeleteCommand(context));
  program.addCommand(createStatsCommand(context));

  return { program, context };
}
