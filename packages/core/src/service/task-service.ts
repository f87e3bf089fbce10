/**
 * TaskService - the task query/update contract.
 *
 * Stateless: every call goes straight to the repository. Not-found and
 * validation outcomes come back as ServiceResult variants; a failing store
 * throws PersistenceError out of the call.
 */

import type {
  Task, TaskId, NewTask, TaskChanges, TaskPage, TaskStatistics,
} from '../types/task.js';
import { TaskStatus } from '../types/task-status.js';
import { Priority } from '../types/priority.js';
import { ok, notFound, invalid, type ServiceResult } from '../types/results.js';
import type { TaskRepository, TaskFilter } from '../repository/task-repository.js';
import type { Logger } from '../logger.js';
import { createSilentLogger } from '../logger.js';
import { checkTitle, nextTimestamp, buildTask, applyChanges } from './task-helpers.js';

export interface PageOptions {
  skip?: number;
  limit?: number;
}

export interface ListOptions extends PageOptions {
  status?: TaskStatus;
  priority?: Priority;
}

export interface SearchOptions extends PageOptions {
  query: string;
}

export interface TaskServiceOptions {
  defaultPageSize: number;
  maxPageSize: number;
  clock?: () => Date;
  logger?: Logger;
}

type Window = { skip: number; limit: number };

export class TaskService {
  private readonly defaultPageSize: number;
  private readonly maxPageSize: number;
  private readonly clock: () => Date;
  private readonly logger: Logger;

  constructor(
    private readonly repo: TaskRepository,
    options: TaskServiceOptions,
  ) {
    this.defaultPageSize = options.defaultPageSize;
    this.maxPageSize = options.maxPageSize;
    this.clock = options.clock ?? (() => new Date());
    this.logger = options.logger ?? createSilentLogger();
  }

  create(input: NewTask): ServiceResult<Task> {
    const titleError = checkTitle(input.title);
    if (titleError) return invalid(titleError, 'title');

    const task = this.repo.insert(buildTask(input, this.clock()));
    this.logger.debug({ taskId: task.id }, 'Task created');
    return ok(task);
  }

  get(id: TaskId): ServiceResult<Task> {
    const task = this.repo.getById(id);
    return task ? ok(task) : notFound(id);
  }

  list(options: ListOptions = {}): ServiceResult<TaskPage> {
    const window = this.resolveWindow(options);
    if ('message' in window) return invalid(window.message, window.field);

    const filter: TaskFilter = {};
    if (options.status !== undefined) filter.status = options.status;
    if (options.priority !== undefined) filter.priority = options.priority;

    return ok(this.page(filter, window));
  }

  search(options: SearchOptions): ServiceResult<TaskPage> {
    if (options.query.length === 0) return invalid('Search query must not be empty', 'q');

    const window = this.resolveWindow(options);
    if ('message' in window) return invalid(window.message, window.field);

    return ok(this.page({ text: options.query }, window));
  }

  /** Full and partial updates share this: only supplied fields change */
  update(id: TaskId, changes: TaskChanges): ServiceResult<Task> {
    if (changes.title !== undefined) {
      const titleError = checkTitle(changes.title);
      if (titleError) return invalid(titleError, 'title');
    }
    return this.mutate(id, changes);
  }

  updateStatus(id: TaskId, status: TaskStatus): ServiceResult<Task> {
    return this.mutate(id, { status });
  }

  updatePriority(id: TaskId, priority: Priority): ServiceResult<Task> {
    return this.mutate(id, { priority });
  }

  /** Permanent. A second call for the same id is not-found. */
  delete(id: TaskId): ServiceResult<void> {
    if (!this.repo.getById(id)) return notFound(id);
    if (!this.repo.delete(id)) return notFound(id);

    this.logger.debug({ taskId: id }, 'Task deleted');
    return ok(undefined);
  }

  statistics(): ServiceResult<TaskStatistics> {
    const statusCounts = this.repo.countBy('status');
    const priorityCounts = this.repo.countBy('priority');

    const byStatus: Record<TaskStatus, number> = {
      [TaskStatus.Pending]: statusCounts.get(TaskStatus.Pending) ?? 0,
      [TaskStatus.InProgress]: statusCounts.get(TaskStatus.InProgress) ?? 0,
      [TaskStatus.Completed]: statusCounts.get(TaskStatus.Completed) ?? 0,
    };
    const byPriority: Record<Priority, number> = {
      [Priority.High]: priorityCounts.get(Priority.High) ?? 0,
      [Priority.Medium]: priorityCounts.get(Priority.Medium) ?? 0,
      [Priority.Low]: priorityCounts.get(Priority.Low) ?? 0,
    };

    return ok({ totalTasks: this.repo.count(), byStatus, byPriority });
  }

  /** Throws if the store is unreachable */
  ping(): void {
    this.repo.ping();
  }

  private mutate(id: TaskId, changes: TaskChanges): ServiceResult<Task> {
    const task = this.repo.getById(id);
    if (!task) return notFound(id);

    const updated = this.repo.update(applyChanges(task, changes, nextTimestamp(task.updatedAt, this.clock())));
    if (!updated) return notFound(id);

    this.logger.debug({ taskId: id, fields: Object.keys(changes) }, 'Task updated');
    return ok(updated);
  }

  private page(filter: TaskFilter, window: Window): TaskPage {
    const { tasks, total } = this.repo.listFiltered({ ...filter, ...window });
    return { tasks, total, skip: window.skip, limit: window.limit };
  }

  private resolveWindow(options: PageOptions): Window | { message: string; field: string } {
    const skip = options.skip ?? 0;
    const limit = options.limit ?? this.defaultPageSize;

    if (!Number.isSafeInteger(skip) || skip < 0) {
      return { message: 'skip must be a non-negative integer', field: 'skip' };
    }
    if (!Number.isInteger(limit) || limit < 1 || limit > this.maxPageSize) {
      return { message: `limit must be an integer between 1 and ${this.maxPageSize}`, field: 'limit' };
    }
    return { skip, limit };
  }
}
