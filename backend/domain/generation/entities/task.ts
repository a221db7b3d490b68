/**
 * 生成任务快照。每次轮询返回新的快照，不在原对象上修改
 */
import { ServiceError } from '../errors.js';
import type { Result } from './result.js';
import {
  isFailedStatus,
  isPendingStatus,
  type FailedStatus,
  type PendingStatus,
} from '../value-objects/task-status.js';

interface TaskBase {
  /** 服务端分配的任务 id */
  readonly id: string;
}

export interface PendingTask extends TaskBase {
  readonly kind: 'pending';
  readonly status: PendingStatus;
  readonly result: null;
  readonly isDone: false;
}

export interface ReadyTask extends TaskBase {
  readonly kind: 'ready';
  readonly status: 'Ready';
  readonly result: Result;
  readonly isDone: true;
}

export interface FailedTask extends TaskBase {
  readonly kind: 'failed';
  readonly status: FailedStatus;
  readonly result: null;
  readonly isDone: true;
}

/** 文档外的状态字符串（provider 新增的审核态等），按终态失败处理 */
export interface UnknownTerminalTask extends TaskBase {
  readonly kind: 'unknown';
  readonly status: string;
  readonly result: null;
  readonly isDone: true;
}

export type Task = PendingTask | ReadyTask | FailedTask | UnknownTerminalTask;

export function createPendingTask(id: string, status: PendingStatus = 'Pending'): PendingTask {
  return Object.freeze({ kind: 'pending', id, status, result: null, isDone: false });
}

export function createReadyTask(id: string, result: Result): ReadyTask {
  return Object.freeze({ kind: 'ready', id, status: 'Ready', result, isDone: true });
}

export function createFailedTask(id: string, status: FailedStatus): FailedTask {
  return Object.freeze({ kind: 'failed', id, status, result: null, isDone: true });
}

export function createUnknownTask(id: string, status: string): UnknownTerminalTask {
  return Object.freeze({ kind: 'unknown', id, status, result: null, isDone: true });
}

/**
 * 根据状态字符串构造对应变体。非 Ready 状态下的 result 会被丢弃；
 * Ready 但缺少 result 视为服务端违约
 */
export function createTaskSnapshot(id: string, status: string, result: Result | null): Task {
  if (isPendingStatus(status)) return createPendingTask(id, status);
  if (status === 'Ready') {
    if (!result) {
      throw new ServiceError(`Task ${id} is Ready but carries no result`, JSON.stringify({ id, status }));
    }
    return createReadyTask(id, result);
  }
  if (isFailedStatus(status)) return createFailedTask(id, status);
  return createUnknownTask(id, status);
}

export function isTaskDone(task: Task): boolean {
  return task.isDone;
}

export function isTaskSucceeded(task: Task): task is ReadyTask {
  return task.kind === 'ready';
}
