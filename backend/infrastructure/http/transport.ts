/**
 * HTTP 传输协作者：发送已带鉴权头的请求，返回状态码与原始响应体
 */

export type HttpMethod = 'GET' | 'POST';

export interface TransportRequest {
  method: HttpMethod;
  url: string;
  headers: Record<string, string>;
  /** 已序列化的 JSON 请求体 */
  body?: string;
}

export interface TransportResponse {
  status: number;
  body: string;
}

export interface HttpTransport {
  request(req: TransportRequest): Promise<TransportResponse>;
}

/** 基于全局 fetch 的默认实现 */
export class FetchTransport implements HttpTransport {
  async request(req: TransportRequest): Promise<TransportResponse> {
    const res = await fetch(req.url, {
      method: req.method,
      headers: req.headers,
      ...(req.body !== undefined ? { body: req.body } : {}),
    });
    const body = await res.text();
    return { status: res.status, body };
  }
}
