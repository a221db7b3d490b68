/**
 * 图像生成任务客户端：提交生成请求、按 id 查询任务状态
 * 不内置轮询循环与重试，节奏与超时由调用方决定
 */
import {
  AuthenticationError,
  NotFoundError,
  RequestError,
  ServiceError,
  type GenerationParameters,
  type ModelInputMap,
  type PendingTask,
  type Task,
} from '#backend/domain/index.js';
import type { ClientConfig } from '#backend/config/client-config.js';
import { getLogManager, type TaskLogger } from '#backend/services/log-manager.js';
import { FetchTransport, type HttpMethod, type HttpTransport, type TransportResponse } from '../http/transport.js';
import { AsyncTaskBase } from './bases/async-task-base.js';
import { decodeSubmission, decodeTaskSnapshot } from './decode.js';

export interface TaskClientDeps {
  transport?: HttpTransport;
  logger?: TaskLogger;
}

export class TaskClient extends AsyncTaskBase<PendingTask> {
  private readonly transport: HttpTransport;
  private readonly logger: TaskLogger;

  constructor(
    private readonly config: ClientConfig,
    deps: TaskClientDeps = {}
  ) {
    super();
    this.transport = deps.transport ?? new FetchTransport();
    this.logger = deps.logger ?? getLogManager(config.logRoot);
  }

  submit<M extends keyof ModelInputMap>(model: M, parameters: ModelInputMap[M]): Promise<PendingTask>;
  submit(model: string, parameters: GenerationParameters): Promise<PendingTask>;
  submit(model: string, parameters: GenerationParameters): Promise<PendingTask> {
    return super.submit(model, parameters);
  }

  /** 同 submit */
  generate<M extends keyof ModelInputMap>(model: M, parameters: ModelInputMap[M]): Promise<PendingTask>;
  generate(model: string, parameters: GenerationParameters): Promise<PendingTask>;
  generate(model: string, parameters: GenerationParameters): Promise<PendingTask> {
    return this.submit(model, parameters);
  }

  /** 同 poll */
  getResult(task: Task | string): Promise<Task> {
    return this.poll(task);
  }

  protected async _submit(model: string, parameters: GenerationParameters): Promise<PendingTask> {
    const path = this.config.submitPath.replace('{model}', encodeURIComponent(model));
    const res = await this.send('POST', path, { body: JSON.stringify(parameters) });
    this.assertOk(res, 'submit');
    const task = await this.decode(() => decodeSubmission(res.body), { model });
    await this.logger.logSystem('info', 'Task submitted', { model, taskId: task.id });
    return task;
  }

  protected async _poll(taskId: string): Promise<Task> {
    const path = `${this.config.resultPath}?id=${encodeURIComponent(taskId)}`;
    const res = await this.send('GET', path, { taskId });
    if (res.status === 404) {
      throw new NotFoundError(taskId);
    }
    this.assertOk(res, 'poll');
    const task = await this.decode(() => decodeTaskSnapshot(res.body, taskId), { taskId });
    await this.logger.logSystem('debug', 'Task polled', { taskId, status: task.status, isDone: task.isDone });
    return task;
  }

  /** 先校验 API Key，缺失时不发起任何网络请求 */
  private headers(): Record<string, string> {
    const apiKey = this.config.apiKey?.trim();
    if (!apiKey) {
      throw new AuthenticationError(
        'API key is required. Set BFL_API_KEY environment variable or pass apiKey to the client config.'
      );
    }
    return {
      'x-key': apiKey,
      'User-Agent': this.config.userAgent,
      'Content-Type': 'application/json',
    };
  }

  private async send(
    method: HttpMethod,
    path: string,
    opts: { body?: string; taskId?: string }
  ): Promise<TransportResponse> {
    const headers = this.headers();
    const url = this.config.baseUrl + path;
    const startedAt = Date.now();
    const res = await this.transport.request({
      method,
      url,
      headers,
      ...(opts.body !== undefined ? { body: opts.body } : {}),
    });
    await this.logger.logRequest({
      method,
      url,
      status: res.status,
      durationMs: Date.now() - startedAt,
      ...(opts.taskId ? { taskId: opts.taskId } : {}),
    });
    return res;
  }

  private assertOk(res: TransportResponse, op: 'submit' | 'poll'): void {
    if (res.status === 401 || res.status === 403) {
      throw new AuthenticationError(`Task ${op} rejected: ${res.status} ${res.body}`, res.status);
    }
    if (res.status < 200 || res.status >= 300) {
      throw new RequestError(`Task ${op} failed: ${res.status} ${res.body}`, res.status, res.body);
    }
  }

  /** 解码失败时记录原始响应体后再抛出 */
  private async decode<T>(fn: () => T, meta: Record<string, unknown>): Promise<T> {
    try {
      return fn();
    } catch (error) {
      if (error instanceof ServiceError) {
        await this.logger.logSystem('error', error.message, { ...meta, rawBody: error.rawBody });
      }
      throw error;
    }
  }
}
