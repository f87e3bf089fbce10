import { Command } from 'commander';
import type { CliContext } from '../context.js';
import * as out from '../output.js';
import { parseTaskId, $try } from '../helpers.js';

export function createDeleteCommand(ctx: CliContext): Command {
  return new Command('delete')
    .description('Permanently delete one or more tasks')
    .argument('<taskIds...>', 'The id(s) of the task(s) to delete')
    .action((taskIds: string[]) => $try(() => {
      for (const taskId of taskIds) {
        const id = parseTaskId(taskId);
        if (id === null) {
          out.fail(`Invalid task id: '${taskId}'`);
          continue;
        }

        const result = ctx.service().delete(id);
        if (result.type !== 'success') {
          out.printFailure(result);
          continue;
        }

        out.success(`Task ${id} deleted`);
      }
    }));
}
