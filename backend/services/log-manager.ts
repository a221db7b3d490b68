/**
 * Log Manager - 统一日志管理
 * 请求日志按日期写入 logs/requests/{date}/requests.jsonl，系统日志写入 logs/system/
 */

import { promises as fs } from 'fs';
import path from 'path';
import { randomUUID } from 'crypto';
import { DEFAULT_LOG_CONFIG, getLogConfig, shouldLog, type LogConfig, type LogLevel } from '../config/log-config.js';

export type { LogLevel };
export type LogType = 'requests' | 'system';

export interface RequestLogData {
  method: string;
  url: string;
  status: number;
  durationMs: number;
  taskId?: string;
}

export interface LogEntry {
  timestamp: string;
  [key: string]: unknown;
}

export interface LogFilter {
  startDate?: string;
  endDate?: string;
  level?: LogLevel;
  search?: string;
}

/** 客户端依赖的日志能力 */
export interface TaskLogger {
  logRequest(data: RequestLogData): Promise<void>;
  logSystem(level: LogLevel, message: string, meta?: Record<string, unknown>): Promise<void>;
}

function today(): string {
  return new Date().toISOString().split('T')[0];
}

/**
 * 统一日志管理器
 */
export class LogManager implements TaskLogger {
  private logRoot: string;

  constructor(
    logRoot?: string,
    private readonly config: LogConfig = DEFAULT_LOG_CONFIG
  ) {
    this.logRoot = logRoot || path.join(process.cwd(), 'logs');
  }

  getLogRoot(): string {
    return this.logRoot;
  }

  /**
   * 确保日志目录存在
   */
  private async ensureLogDir(type: LogType, date?: string): Promise<string> {
    const dirPath =
      type === 'system'
        ? path.join(this.logRoot, 'system')
        : path.join(this.logRoot, type, date || today());
    await fs.mkdir(dirPath, { recursive: true });
    return dirPath;
  }

  /**
   * 记录一次 HTTP 往返
   */
  async logRequest(data: RequestLogData): Promise<void> {
    if (!this.config.requests) return;
    try {
      const dirPath = await this.ensureLogDir('requests');
      const logEntry = {
        logId: randomUUID(),
        timestamp: new Date().toISOString(),
        ...data,
      };
      await fs.appendFile(path.join(dirPath, 'requests.jsonl'), JSON.stringify(logEntry) + '\n', 'utf-8');
    } catch (error) {
      console.error('[LogManager] Failed to log request:', error);
    }
  }

  /**
   * 记录系统日志
   */
  async logSystem(level: LogLevel, message: string, meta?: Record<string, unknown>): Promise<void> {
    if (!shouldLog(level, this.config.level)) return;
    try {
      const dirPath = await this.ensureLogDir('system');
      const logFile = path.join(dirPath, level === 'error' ? 'error.log' : 'app.log');

      const logEntry = {
        timestamp: new Date().toISOString(),
        level,
        message,
        ...meta,
      };
      await fs.appendFile(logFile, JSON.stringify(logEntry) + '\n', 'utf-8');

      if (this.config.consoleOutput) {
        const consoleMsg = `[${level.toUpperCase()}] ${message}`;
        if (level === 'error') {
          console.error(consoleMsg, meta ?? '');
        } else if (level === 'warn') {
          console.warn(consoleMsg, meta ?? '');
        } else {
          console.log(consoleMsg, meta ?? '');
        }
      }
    } catch (error) {
      console.error('[LogManager] Failed to log system:', error);
    }
  }

  /**
   * 查询日志
   */
  async queryLogs(type: LogType, filter?: LogFilter): Promise<LogEntry[]> {
    const results: LogEntry[] = [];
    const files =
      type === 'system'
        ? [path.join(this.logRoot, 'system', filter?.level === 'error' ? 'error.log' : 'app.log')]
        : this.getDateRange(filter?.startDate || today(), filter?.endDate || filter?.startDate || today()).map(
            (date) => path.join(this.logRoot, type, date, 'requests.jsonl')
          );

    for (const file of files) {
      let content: string;
      try {
        content = await fs.readFile(file, 'utf-8');
      } catch (error) {
        if ((error as NodeJS.ErrnoException).code === 'ENOENT') continue;
        throw error;
      }
      for (const line of content.split('\n')) {
        if (!line.trim()) continue;
        const entry = this.parseLine(line);
        if (!entry) continue;
        if (filter?.level && entry.level !== filter.level) continue;
        if (filter?.search && !line.includes(filter.search)) continue;
        results.push(entry);
      }
    }
    return results;
  }

  private parseLine(line: string): LogEntry | null {
    try {
      const value: unknown = JSON.parse(line);
      if (typeof value === 'object' && value !== null && 'timestamp' in value && typeof value.timestamp === 'string') {
        return { ...value, timestamp: value.timestamp };
      }
    } catch {
      console.warn('[LogManager] Skipping malformed log line');
    }
    return null;
  }

  /**
   * 获取日期范围
   */
  private getDateRange(start: string, end: string): string[] {
    const dates: string[] = [];
    const current = new Date(start);
    const endDate = new Date(end);
    while (current <= endDate) {
      dates.push(current.toISOString().split('T')[0]);
      current.setUTCDate(current.getUTCDate() + 1);
    }
    return dates;
  }
}

// 单例实例
let logManagerInstance: LogManager | null = null;

/**
 * 获取 LogManager 单例
 */
export function getLogManager(logRoot?: string): LogManager {
  if (!logManagerInstance || (logRoot && logManagerInstance.getLogRoot() !== logRoot)) {
    logManagerInstance = new LogManager(logRoot, getLogConfig());
  }
  return logManagerInstance;
}
