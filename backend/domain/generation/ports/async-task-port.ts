/**
 * 异步任务端口：submit + poll 模式，轮询节奏由调用方控制
 */
import type { Task } from '../entities/task.js';
import type { GenerationParameters } from '../types.js';

export interface AsyncTaskPort<TSubmitted extends Task = Task> {
  submit(model: string, parameters: GenerationParameters): Promise<TSubmitted>;
  poll(task: Task | string): Promise<Task>;
}
