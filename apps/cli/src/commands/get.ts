import { Command } from 'commander';
import type { CliContext } from '../context.js';
import * as out from '../output.js';
import { parseTaskId, $try } from '../helpers.js';

export function createGetCommand(ctx: CliContext): Command {
  return new Command('get')
    .description('Show detailed information about a task')
    .argument('<taskId>', 'The task ID to retrieve')
    .option('--json', 'Output in JSON format')
    .action((taskId: string, opts: { json?: boolean }) => $try(() => {
      const id = parseTaskId(taskId);
      if (id === null) {
        out.fail(`Invalid task id: '${taskId}'`);
        return;
      }

      const result = ctx.service().get(id);
      if (result.type !== 'success') {
        out.printFailure(result);
        return;
      }

      if (opts.json) {
        console.log(JSON.stringify(result.data, null, 2));
      } else {
        out.printTask(result.data);
      }
    }));
}
