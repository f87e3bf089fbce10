export { TaskService } from './task-service.js';
export type { TaskServiceOptions, ListOptions, SearchOptions, PageOptions } from './task-service.js';
export { titleLength, checkTitle, nextTimestamp, buildTask, applyChanges } from './task-helpers.js';
