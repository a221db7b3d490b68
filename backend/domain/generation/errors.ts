/**
 * 客户端错误分类：鉴权 / 请求 / 未找到 / 服务响应异常
 * 均不在客户端内部重试，由调用方决定重试策略
 */

export class GenerationClientError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'GenerationClientError';
  }
}

/** 未配置 API Key，或服务端返回 401/403 */
export class AuthenticationError extends GenerationClientError {
  constructor(message: string, public readonly status?: number) {
    super(message);
    this.name = 'AuthenticationError';
  }
}

/** 非 2xx 响应，携带状态码与响应体便于排查 */
export class RequestError extends GenerationClientError {
  constructor(
    message: string,
    public readonly status: number,
    public readonly body: string
  ) {
    super(message);
    this.name = 'RequestError';
  }
}

export class NotFoundError extends GenerationClientError {
  constructor(public readonly taskId: string) {
    super(`Task not found: ${taskId}`);
    this.name = 'NotFoundError';
  }
}

/** 响应体无法解析为预期结构 */
export class ServiceError extends GenerationClientError {
  constructor(message: string, public readonly rawBody: string) {
    super(message);
    this.name = 'ServiceError';
  }
}
