/**
 * Task Routes - CRUD, filtering, search and statistics under /api/v1/tasks
 *
 * Handlers validate the request, call the TaskService and map its result:
 * success to JSON, failure variants through failureResponse.
 */

import type { ServiceResult } from '@taskdeck/core';
import {
  createTaskSchema, updateTaskSchema, statusUpdateSchema, priorityUpdateSchema,
  listQuerySchema, searchQuerySchema, taskIdSchema,
  toNewTask, toTaskChanges, toTaskResponse, toTaskListResponse, toStatisticsResponse,
} from '../dto/task.dto.js';
import { parseOrThrow, readJsonBody, searchParamsToObject } from '../dto/validation.js';
import { failureResponse, jsonResponse } from '../error-handler.js';
import type { RouteContext } from './context.js';

function respond<T>(
  result: ServiceResult<T>,
  correlationId: string,
  toBody: (data: T) => unknown,
  status = 200,
): Response {
  if (result.type !== 'success') return failureResponse(result, correlationId);
  return jsonResponse(toBody(result.data), status);
}

function taskIdFrom(ctx: RouteContext): number {
  return parseOrThrow(taskIdSchema, ctx.params[0], 'task_id');
}

export async function handleCreateTask(ctx: RouteContext): Promise<Response> {
  const body = parseOrThrow(createTaskSchema, await readJsonBody(ctx.request), 'body');
  const result = ctx.container.taskService.create(toNewTask(body));
  return respond(result, ctx.correlationId, toTaskResponse, 201);
}

export function handleListTasks(ctx: RouteContext): Response {
  const { config, taskService } = ctx.container;
  const query = parseOrThrow(
    listQuerySchema(config.defaultPageSize, config.maxPageSize),
    searchParamsToObject(ctx.url),
    'query',
  );
  return respond(taskService.list(query), ctx.correlationId, toTaskListResponse);
}

export function handleSearchTasks(ctx: RouteContext): Response {
  const { config, taskService } = ctx.container;
  const { q, skip, limit } = parseOrThrow(
    searchQuerySchema(config.defaultPageSize, config.maxPageSize),
    searchParamsToObject(ctx.url),
    'query',
  );
  return respond(taskService.search({ query: q, skip, limit }), ctx.correlationId, toTaskListResponse);
}

export function handleTaskStatistics(ctx: RouteContext): Response {
  return respond(ctx.container.taskService.statistics(), ctx.correlationId, toStatisticsResponse);
}

export function handleGetTask(ctx: RouteContext): Response {
  const id = taskIdFrom(ctx);
  return respond(ctx.container.taskService.get(id), ctx.correlationId, toTaskResponse);
}

/** PUT and PATCH: only keys present in the body change */
export async function handleUpdateTask(ctx: RouteContext): Promise<Response> {
  const id = taskIdFrom(ctx);
  const body = parseOrThrow(updateTaskSchema, await readJsonBody(ctx.request), 'body');
  const result = ctx.container.taskService.update(id, toTaskChanges(body));
  return respond(result, ctx.correlationId, toTaskResponse);
}

export async function handleUpdateTaskStatus(ctx: RouteContext): Promise<Response> {
  const id = taskIdFrom(ctx);
  const { status } = parseOrThrow(statusUpdateSchema, await readJsonBody(ctx.request), 'body');
  return respond(ctx.container.taskService.updateStatus(id, status), ctx.correlationId, toTaskResponse);
}

export async function handleUpdateTaskPriority(ctx: RouteContext): Promise<Response> {
  const id = taskIdFrom(ctx);
  const { priority } = parseOrThrow(priorityUpdateSchema, await readJsonBody(ctx.request), 'body');
  return respond(ctx.container.taskService.updatePriority(id, priority), ctx.correlationId, toTaskResponse);
}

export function handleDeleteTask(ctx: RouteContext): Response {
  const id = taskIdFrom(ctx);
  const result = ctx.container.taskService.delete(id);
  if (result.type !== 'success') return failureResponse(result, ctx.correlationId);
  return new Response(null, { status: 204 });
}
