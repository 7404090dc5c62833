/**
 * 核心模块导出
 */
export * from './types';
export * from './errors';
export { TaskRegistry, expandPeriodic } from './TaskRegistry';
export { ResourceGraph } from './ResourceGraph';
export type { AcquireResult } from './ResourceGraph';
