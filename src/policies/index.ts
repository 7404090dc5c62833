/**
 * 调度策略模块导出
 */
export { OrderingPolicy, compareTasks } from './OrderingPolicy';
export { FcfsPolicy } from './FcfsPolicy';
export { SjfPolicy } from './SjfPolicy';
export { SrtfPolicy } from './SrtfPolicy';
export { EdfPolicy } from './EdfPolicy';
export { RoundRobinPolicy } from './RoundRobinPolicy';
export { PriorityPolicy } from './PriorityPolicy';
export { RateMonotonicPolicy } from './RateMonotonicPolicy';
export { LeastLaxityPolicy, laxityOf } from './LeastLaxityPolicy';
export { HybridPolicy } from './HybridPolicy';
export { createPolicy, createDelegatePolicy, createHybridPolicy, POLICY_DESCRIPTIONS } from './PolicyFactory';
export type { PolicyOptions } from './PolicyFactory';
export type { SchedulingPolicy, SelectionContext } from './types';
