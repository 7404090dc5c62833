/**
 * 死锁处理模块导出
 */
export { WaitForGraph } from './WaitForGraph';
export { DeadlockDetector } from './DeadlockDetector';
export type { DeadlockResolution } from './types';
