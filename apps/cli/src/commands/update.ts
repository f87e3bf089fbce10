import { Command } from 'commander';
import { parseDate } from '@taskdeck/core';
import type { CliContext } from '../context.js';
import * as out from '../output.js';
import { parseTaskId, $try } from '../helpers.js';

interface UpdateOptions {
  title?: string;
  description?: string;
  clearDescription?: boolean;
  due?: string;
  clearDue?: boolean;
}

export function createUpdateCommand(ctx: CliContext): Command {
  return new Command('update')
    .description('Change the title, description or due date of a task')
    .argument('<taskId>', 'The id of the task')
    .option('--title <title>', 'New title')
    .option('-d, --description <text>', 'New description')
    .option('--clear-description', 'Remove the description')
    .option('--due <date>', 'New due date')
    .option('--clear-due', 'Remove the due date')
    .action((taskId: string, opts: UpdateOptions) => $try(() => {
      const id = parseTaskId(taskId);
      if (id === null) {
        out.fail(`Invalid task id: '${taskId}'`);
        return;
      }

      let dueDate: string | null | undefined = opts.clearDue ? null : undefined;
      if (opts.due !== undefined) {
        dueDate = parseDate(opts.due);
        if (dueDate === null) {
          out.fail(`Could not parse due date: '${opts.due}'`);
          return;
        }
      }

      const result = ctx.service().update(id, {
        title: opts.title,
        description: opts.clearDescription ? null : opts.description,
        dueDate,
      });
      if (result.type !== 'success') {
        out.printFailure(result);
        return;
      }

      out.success(`Task ${id} updated`);
    }));
}
