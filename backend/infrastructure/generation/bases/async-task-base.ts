/**
 * 异步任务客户端基类：封装 submit + poll 契约
 * 子类实现 _submit 与 _poll 完成具体 provider 调用
 */
import type { AsyncTaskPort, GenerationParameters, Task } from '#backend/domain/index.js';

export abstract class AsyncTaskBase<TSubmitted extends Task = Task>
  implements AsyncTaskPort<TSubmitted>
{
  async submit(model: string, parameters: GenerationParameters): Promise<TSubmitted> {
    if (typeof model !== 'string' || !model.trim()) {
      throw new Error('model must be a non-empty string');
    }
    return this._submit(model, parameters);
  }

  async poll(task: Task | string): Promise<Task> {
    const taskId = typeof task === 'string' ? task : task.id;
    if (!taskId) {
      throw new Error('task id must be a non-empty string');
    }
    return this._poll(taskId);
  }

  protected abstract _submit(model: string, parameters: GenerationParameters): Promise<TSubmitted>;
  protected abstract _poll(taskId: string): Promise<Task>;
}
