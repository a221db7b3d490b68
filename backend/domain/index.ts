/**
 * 领域层导出
 */
export * from './generation/index.js';
