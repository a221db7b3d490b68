/**
 * 包入口：领域类型、客户端与默认客户端快捷方法
 */
import path from 'path';
import { loadClientConfig, type LoadClientConfigOptions } from './config/client-config.js';
import { TaskClient, type TaskClientDeps } from './infrastructure/generation/task-client.js';
import type { GenerationParameters, ModelInputMap, PendingTask, Task } from './domain/index.js';

export * from './domain/index.js';
export { TaskClient, type TaskClientDeps } from './infrastructure/generation/task-client.js';
export { AsyncTaskBase } from './infrastructure/generation/bases/async-task-base.js';
export { decodeSubmission, decodeTaskSnapshot } from './infrastructure/generation/decode.js';
export {
  FetchTransport,
  type HttpMethod,
  type HttpTransport,
  type TransportRequest,
  type TransportResponse,
} from './infrastructure/http/transport.js';
export { loadClientConfig, type ClientConfig, type LoadClientConfigOptions } from './config/client-config.js';
export { LogManager, getLogManager, type TaskLogger, type RequestLogData } from './services/log-manager.js';

export async function createTaskClient(
  options: LoadClientConfigOptions = {},
  deps: TaskClientDeps = {}
): Promise<TaskClient> {
  const config = await loadClientConfig(options);
  return new TaskClient(config, deps);
}

let defaultClient: Promise<TaskClient> | null = null;

/** 默认客户端：首次使用时从环境变量与当前目录的 .env 构建 */
function getDefaultClient(): Promise<TaskClient> {
  if (!defaultClient) {
    const pending = createTaskClient({ envFile: path.join(process.cwd(), '.env') });
    defaultClient = pending;
    pending.catch(() => {
      if (defaultClient === pending) defaultClient = null;
    });
  }
  return defaultClient;
}

export function resetDefaultClient(): void {
  defaultClient = null;
}

export function generate<M extends keyof ModelInputMap>(
  model: M,
  parameters: ModelInputMap[M]
): Promise<PendingTask>;
export function generate(model: string, parameters: GenerationParameters): Promise<PendingTask>;
export async function generate(model: string, parameters: GenerationParameters): Promise<PendingTask> {
  const client = await getDefaultClient();
  return client.submit(model, parameters);
}

export async function getResult(task: Task | string): Promise<Task> {
  const client = await getDefaultClient();
  return client.poll(task);
}
