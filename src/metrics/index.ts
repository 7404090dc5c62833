/**
 * 指标模块导出
 */
export { CoreStatusModel, DEFAULT_CORE_MODEL } from './CoreStatusModel';
export type { CoreReading } from './CoreStatusModel';
export { computeMetrics } from './MetricsCollector';
export type { MetricsOptions, MetricsTaskInput } from './MetricsCollector';
