export { TaskStatus, TaskStatusName, TASK_STATUSES, isTaskStatus } from './task-status.js';
export { Priority, PriorityName, PRIORITIES, isPriority } from './priority.js';
export { TITLE_MAX_LENGTH } from './task.js';
export type { TaskId, Task, NewTask, TaskChanges, TaskPage, TaskStatistics } from './task.js';
export type { ServiceResult, Failure } from './results.js';
export { ok, notFound, invalid, isSuccess, isFailure } from './results.js';
