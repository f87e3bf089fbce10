import { Command } from 'commander';
import { TaskStatusName, PriorityName } from '@taskdeck/core';
import type { CliContext } from '../context.js';
import * as out from '../output.js';
import { parseStatus, parsePriority, parseTaskId, $try } from '../helpers.js';

export function createStatusCommand(ctx: CliContext): Command {
  return new Command('status')
    .description('Set the status of a task')
    .argument('<taskId>', 'The id of the task')
    .argument('<status>', 'The status to set: pending, in-progress, completed')
    .action((taskId: string, statusStr: string) => $try(() => {
      const id = parseTaskId(taskId);
      if (id === null) {
        out.fail(`Invalid task id: '${taskId}'`);
        return;
      }

      const status = parseStatus(statusStr);
      if (status === null) {
        out.fail(`Unknown status: '${statusStr}'. Use: pending, in-progress, completed`);
        return;
      }

      const result = ctx.service().updateStatus(id, status);
      if (result.type !== 'success') {
        out.printFailure(result);
        return;
      }

      out.success(`Task ${id} set to ${TaskStatusName[status]}`);
    }));
}

export function createPriorityCommand(ctx: CliContext): Command {
  return new Command('priority')
    .description('Set the priority of a task')
    .argument('<taskId>', 'The id of the task')
    .argument('<level>', 'high, medium, low (or 1/2/3)')
    .action((taskId: string, level: string) => $try(() => {
      const id = parseTaskId(taskId);
      if (id === null) {
        out.fail(`Invalid task id: '${taskId}'`);
        return;
      }

      const priority = parsePriority(level);
      if (priority === null) {
        out.fail(`Unknown priority: '${level}'. Use: high, medium, low`);
        return;
      }

      const result = ctx.service().updatePriority(id, priority);
      if (result.type !== 'success') {
        out.printFailure(result);
        return;
      }

      out.success(`Task ${id} priority set to ${PriorityName[priority]}`);
    }));
}
