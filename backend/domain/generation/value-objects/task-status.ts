/**
 * 任务状态值对象：服务端文档中的状态字符串与分类
 */

export type PendingStatus = 'Pending' | 'Queued';
export type ReadyStatus = 'Ready';
export type FailedStatus = 'Error' | 'Failed' | 'Request Moderated' | 'Content Moderated';
/** 结果接口对未知 id 返回的状态；不是任务状态，轮询时转为 NotFoundError */
export type NotFoundStatus = 'Task not found';

export type KnownTaskStatus = PendingStatus | ReadyStatus | FailedStatus;

export type StatusKind = 'pending' | 'ready' | 'failed' | 'unknown';

export const PENDING_STATUSES: readonly PendingStatus[] = ['Pending', 'Queued'];
export const FAILED_STATUSES: readonly FailedStatus[] = [
  'Error',
  'Failed',
  'Request Moderated',
  'Content Moderated',
];
export const NOT_FOUND_STATUS: NotFoundStatus = 'Task not found';

export function isPendingStatus(status: string): status is PendingStatus {
  return (PENDING_STATUSES as readonly string[]).includes(status);
}

export function isFailedStatus(status: string): status is FailedStatus {
  return (FAILED_STATUSES as readonly string[]).includes(status);
}

/**
 * 状态分类。未在文档中出现的字符串一律视为终态失败（unknown），避免调用方无限轮询
 */
export function classifyStatus(status: string): StatusKind {
  if (isPendingStatus(status)) return 'pending';
  if (status === 'Ready') return 'ready';
  if (isFailedStatus(status)) return 'failed';
  return 'unknown';
}

export function isTerminalStatus(status: string): boolean {
  return classifyStatus(status) !== 'pending';
}
