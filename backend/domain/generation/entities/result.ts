/**
 * 生成结果值对象：仅在任务 Ready 时存在，构造后不可变
 */
export interface Result {
  /** 服务端回显的提示词 */
  readonly prompt: string;
  /** 生成图片地址；服务端可能轮换签名链接 */
  readonly sample: string | null;
}

export function createResult(prompt: string, sample: string | null): Result {
  return Object.freeze({ prompt, sample });
}
