/**
 * 自适应调度模块导出
 */
export { AdaptiveController } from './AdaptiveController';
export type { PolicyChange, TickSample } from './AdaptiveController';
export { DEFAULT_ADAPTIVE_RULES, selectPolicy } from './rules';
export type { RuleDecision, WindowMetrics } from './rules';
