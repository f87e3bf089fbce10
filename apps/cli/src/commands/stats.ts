import { Command } from 'commander';
import type { CliContext } from '../context.js';
import * as out from '../output.js';
import { $try } from '../helpers.js';

export function createStatsCommand(ctx: CliContext): Command {
  return new Command('stats')
    .description('Show task counts by status and priority')
    .action(() => $try(() => {
      const result = ctx.service().statistics();
      if (result.type !== 'success') {
        out.printFailure(result);
        return;
      }

      out.printStatistics(result.data);
    }));
}
