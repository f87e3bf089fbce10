export type {
  TaskRepository, TaskFilter, TaskQuery, TaskSlice, GroupField,
} from './task-repository.js';
export { SqliteTaskRepository, escapeLike } from './sqlite-task-repository.js';
