/**
 * 响应解码：原始 JSON → Task 变体（按状态字符串穷举匹配）
 */
import { z } from 'zod';
import {
  createPendingTask,
  createResult,
  createTaskSnapshot,
  NOT_FOUND_STATUS,
  NotFoundError,
  ServiceError,
  type PendingTask,
  type Result,
  type Task,
} from '#backend/domain/index.js';

const submissionSchema = z.object({
  id: z.string().min(1),
});

const resultSchema = z.object({
  prompt: z.string(),
  sample: z.string().url().nullable(),
});

const snapshotSchema = z.object({
  id: z.string().min(1),
  status: z.string().min(1),
  /** 仅 Ready 时按 resultSchema 解析，其余状态忽略 */
  result: z.unknown().optional(),
});

function describeIssues(error: z.ZodError): string {
  return error.issues.map((i) => `${i.path.join('.') || '<root>'}: ${i.message}`).join('; ');
}

export function parseJsonBody(rawBody: string): unknown {
  try {
    return JSON.parse(rawBody);
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e);
    throw new ServiceError(`Response body is not valid JSON: ${reason}`, rawBody);
  }
}

/** 提交响应 `{ id }` → 初始 Pending 任务 */
export function decodeSubmission(rawBody: string): PendingTask {
  const parsed = submissionSchema.safeParse(parseJsonBody(rawBody));
  if (!parsed.success) {
    throw new ServiceError(`Unexpected submission response: ${describeIssues(parsed.error)}`, rawBody);
  }
  return createPendingTask(parsed.data.id);
}

/**
 * 轮询响应 `{ id, status, result }` → Task 快照。
 * `Task not found` 转为 NotFoundError（使用请求时的 id）；响应 id 与请求 id 不一致视为服务端违约
 */
export function decodeTaskSnapshot(rawBody: string, requestedId: string): Task {
  const parsed = snapshotSchema.safeParse(parseJsonBody(rawBody));
  if (!parsed.success) {
    throw new ServiceError(`Unexpected task response: ${describeIssues(parsed.error)}`, rawBody);
  }
  const { id, status, result } = parsed.data;
  if (status === NOT_FOUND_STATUS) {
    throw new NotFoundError(requestedId);
  }
  if (id !== requestedId) {
    throw new ServiceError(`Task response id ${id} does not match requested ${requestedId}`, rawBody);
  }
  if (status !== 'Ready') {
    return createTaskSnapshot(id, status, null);
  }
  if (result === undefined || result === null) {
    throw new ServiceError(`Task ${id} is Ready but carries no result`, rawBody);
  }
  const decoded = resultSchema.safeParse(result);
  if (!decoded.success) {
    throw new ServiceError(`Unexpected task result: ${describeIssues(decoded.error)}`, rawBody);
  }
  const value: Result = createResult(decoded.data.prompt, decoded.data.sample);
  return createTaskSnapshot(id, status, value);
}
