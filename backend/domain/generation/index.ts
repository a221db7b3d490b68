export type { Result } from './entities/result.js';
export { createResult } from './entities/result.js';
export type {
  Task,
  PendingTask,
  ReadyTask,
  FailedTask,
  UnknownTerminalTask,
} from './entities/task.js';
export {
  createPendingTask,
  createReadyTask,
  createFailedTask,
  createUnknownTask,
  createTaskSnapshot,
  isTaskDone,
  isTaskSucceeded,
} from './entities/task.js';
export type {
  PendingStatus,
  ReadyStatus,
  FailedStatus,
  NotFoundStatus,
  KnownTaskStatus,
  StatusKind,
} from './value-objects/task-status.js';
export {
  PENDING_STATUSES,
  FAILED_STATUSES,
  NOT_FOUND_STATUS,
  classifyStatus,
  isPendingStatus,
  isFailedStatus,
  isTerminalStatus,
} from './value-objects/task-status.js';
export {
  GenerationClientError,
  AuthenticationError,
  RequestError,
  NotFoundError,
  ServiceError,
} from './errors.js';
export type { AsyncTaskPort } from './ports/async-task-port.js';
export type {
  FluxProPlusInputs,
  FluxProInputs,
  FluxDevInputs,
  ModelInputMap,
  GenerationModel,
  GenerationParameters,
} from './types.js';
