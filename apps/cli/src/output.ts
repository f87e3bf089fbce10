/**
 * chalk-based output formatting.
 */

import chalk from 'chalk';
import { TaskStatus, Priority, TaskStatusName, PriorityName } from '@taskdeck/core';
import type { Task, TaskPage, TaskStatistics, Failure } from '@taskdeck/core';

// --- Formatting functions ---

export function formatCheckbox(status: TaskStatus): string {
  switch (status) {
    case TaskStatus.Completed: return chalk.green('[x]');
    case TaskStatus.InProgress: return chalk.yellow('[-]');
    default: return chalk.gray('[ ]');
  }
}

export function formatPriority(priority: Priority): string {
  switch (priority) {
    case Priority.High: return chalk.red.bold('>>>');
    case Priority.Medium: return chalk.yellow('>> ');
    case Priority.Low: return chalk.blue('>  ');
  }
}

export function formatDueDate(dueDate: string | null, status: TaskStatus, now: Date = new Date()): string {
  if (!dueDate) return '';

  const [year = 0, month = 1, day = 1] = dueDate.split('-').map(Number);
  const dueD = new Date(year, month - 1, day);
  const todayD = new Date(now.getFullYear(), now.getMonth(), now.getDate());
  const diff = Math.round((dueD.getTime() - todayD.getTime()) / 86400000);

  if (status === TaskStatus.Completed) return chalk.dim(`  Due: ${dueDate}`);
  if (diff < 0) return chalk.red(`  OVERDUE (${-diff}d)`);
  if (diff === 0) return chalk.yellow('  Due: Today');
  if (diff === 1) return chalk.dim('  Due: Tomorrow');
  return chalk.dim(`  Due: ${dueDate}`);
}

export function formatTaskLine(task: Task, now?: Date): string {
  const id = chalk.dim(`(${task.id})`.padEnd(6));
  return `${id} ${formatCheckbox(task.status)} ${formatPriority(task.priority)} ${truncate(task.title, 60)}${formatDueDate(task.dueDate, task.status, now)}`;
}

// --- Result output ---

export function printTask(task: Task): void {
  console.log(`${chalk.bold('ID:')}          ${task.id}`);
  console.log(`${chalk.bold('Title:')}       ${task.title}`);
  console.log(`${chalk.bold('Status:')}      ${TaskStatusName[task.status]}`);
  console.log(`${chalk.bold('Priority:')}    ${PriorityName[task.priority]}`);
  console.log(`${chalk.bold('Due:')}         ${task.dueDate ?? '-'}`);
  console.log(`${chalk.bold('Created:')}     ${task.createdAt}`);
  console.log(`${chalk.bold('Updated:')}     ${task.updatedAt}`);
  if (task.description) {
    console.log(`${chalk.bold('Description:')}`);
    console.log(task.description);
  }
}

export function printPage(page: TaskPage): void {
  if (page.tasks.length === 0) {
    info('No tasks found');
    return;
  }

  for (const task of page.tasks) {
    console.log(formatTaskLine(task));
  }

  const last = page.skip + page.tasks.length;
  console.log(chalk.dim(`Showing ${page.skip + 1}-${last} of ${page.total}`));
}

export function printStatistics(stats: TaskStatistics): void {
  console.log(chalk.bold(`Total: ${stats.totalTasks}`));
  console.log(chalk.bold('By status:'));
  for (const status of [TaskStatus.Pending, TaskStatus.InProgress, TaskStatus.Completed]) {
    console.log(`  ${TaskStatusName[status].padEnd(12)} ${stats.byStatus[status]}`);
  }
  console.log(chalk.bold('By priority:'));
  for (const priority of [Priority.High, Priority.Medium, Priority.Low]) {
    console.log(`  ${PriorityName[priority].padEnd(12)} ${stats.byPriority[priority]}`);
  }
}

export function printFailure(failure: Failure): void {
  switch (failure.type) {
    case 'not-found': fail(`Could not find task with id ${failure.taskId}`); break;
    case 'validation-error': fail(failure.message); break;
  }
}

// --- Basic output ---

export function success(message: string): void {
  console.log(chalk.green(message));
}

export function error(message: string): void {
  console.log(chalk.red(message));
}

/** Print an error and mark the process as failed */
export function fail(message: string): void {
  error(message);
  process.exitCode = 1;
}

export function warning(message: string): void {
  console.log(chalk.yellow(message));
}

export function info(message: string): void {
  console.log(message);
}

// --- Utilities ---

export function truncate(s: string, maxLen: number): string {
  if (s.length <= maxLen) return s;
  return s.slice(0, maxLen - 1) + '…';
}
