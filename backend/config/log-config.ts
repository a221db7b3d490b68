/**
 * Log Configuration
 * 日志系统配置
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogConfig {
  // 最低记录级别
  level: LogLevel;

  // 是否同时输出到控制台
  consoleOutput: boolean;

  // 是否记录每次 HTTP 往返
  requests: boolean;
}

/**
 * 默认日志配置
 */
export const DEFAULT_LOG_CONFIG: LogConfig = {
  level: 'info',
  consoleOutput: true,
  requests: true,
};

/**
 * 开发环境日志配置
 */
export const DEV_LOG_CONFIG: LogConfig = {
  ...DEFAULT_LOG_CONFIG,
  level: 'debug',
};

/**
 * 生产环境日志配置
 */
export const PROD_LOG_CONFIG: LogConfig = {
  ...DEFAULT_LOG_CONFIG,
  level: 'warn',
  consoleOutput: false,
};

/**
 * 根据环境获取日志配置
 */
export function getLogConfig(env: NodeJS.ProcessEnv = process.env): LogConfig {
  switch (env.NODE_ENV) {
    case 'production':
      return PROD_LOG_CONFIG;
    case 'development':
      return DEV_LOG_CONFIG;
    default:
      // 未设置 NODE_ENV：info 级别，debug 不输出
      return DEFAULT_LOG_CONFIG;
  }
}

/**
 * 检查日志级别是否应该记录
 */
export function shouldLog(
  messageLevel: LogLevel,
  configLevel: LogLevel = 'info'
): boolean {
  const levels: LogLevel[] = ['debug', 'info', 'warn', 'error'];
  return levels.indexOf(messageLevel) >= levels.indexOf(configLevel);
}
