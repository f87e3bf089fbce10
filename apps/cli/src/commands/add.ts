import { Command } from 'commander';
import { parseDate } from '@taskdeck/core';
import type { CliContext } from '../context.js';
import * as out from '../output.js';
import { parseStatus, parsePriority, $try } from '../helpers.js';

interface AddOptions {
  description?: string;
  status?: string;
  priority?: string;
  due?: string;
}

export function createAddCommand(ctx: CliContext): Command {
  return new Command('add')
    .description('Add a new task')
    .argument('<title>', 'Task title')
    .option('-d, --description <text>', 'Longer description')
    .option('-s, --status <status>', 'pending, in-progress, completed')
    .option('-p, --priority <level>', 'high, medium, low (or 1/2/3)')
    .option('--due <date>', 'Due date: YYYY-MM-DD, today, tomorrow, +3d, friday')
    .action((title: string, opts: AddOptions) => $try(() => {
      const status = opts.status === undefined ? undefined : parseStatus(opts.status);
      if (status === null) {
        out.fail(`Unknown status: '${opts.status}'. Use: pending, in-progress, completed`);
        return;
      }

      const priority = opts.priority === undefined ? undefined : parsePriority(opts.priority);
      if (priority === null) {
        out.fail(`Unknown priority: '${opts.priority}'. Use: high, medium, low`);
        return;
      }

      const dueDate = opts.due === undefined ? null : parseDate(opts.due);
      if (opts.due !== undefined && dueDate === null) {
        out.fail(`Could not parse due date: '${opts.due}'`);
        return;
      }

      const result = ctx.service().create({
        title,
        description: opts.description ?? null,
        status,
        priority,
        dueDate,
      });
      if (result.type !== 'success') {
        out.printFailure(result);
        return;
      }

      out.success(`Task ${result.data.id} created`);
    }));
}
