import { Command } from 'commander';
import type { CliContext } from '../context.js';
import * as out from '../output.js';
import { parseStatus, parsePriority, parseCount, $try } from '../helpers.js';

interface ListOptions {
  status?: string;
  priority?: string;
  skip?: string;
  limit?: string;
}

export function createListCommand(ctx: CliContext): Command {
  return new Command('list')
    .alias('ls')
    .description('List tasks, newest first')
    .option('-s, --status <status>', 'Only tasks with this status')
    .option('-p, --priority <level>', 'Only tasks with this priority')
    .option('--skip <n>', 'Tasks to skip')
    .option('--limit <n>', 'Maximum tasks to show')
    .action((opts: ListOptions) => $try(() => {
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

      const result = ctx.service().list({
        status,
        priority,
        skip: opts.skip === undefined ? undefined : parseCount(opts.skip),
        limit: opts.limit === undefined ? undefined : parseCount(opts.limit),
      });
      if (result.type !== 'success') {
        out.printFailure(result);
        return;
      }

      out.printPage(result.data);
    }));
}

export function createSearchCommand(ctx: CliContext): Command {
  return new Command('search')
    .description('Find tasks whose title or description contains the text')
    .argument('<query>', 'Text to look for (case-insensitive)')
    .option('--skip <n>', 'Tasks to skip')
    .option('--limit <n>', 'Maximum tasks to show')
    .action((query: string, opts: Pick<ListOptions, 'skip' | 'limit'>) => $try(() => {
      const result = ctx.service().search({
        query,
        skip: opts.skip === undefined ? undefined : parseCount(opts.skip),
        limit: opts.limit === undefined ? undefined : parseCount(opts.limit),
      });
      if (result.type !== 'success') {
        out.printFailure(result);
        return;
      }

      out.printPage(result.data);
    }));
}
