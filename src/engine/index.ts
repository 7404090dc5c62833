/**
 * 仿真引擎模块导出
 */
export { Simulation, simulate } from './Simulation';
export type { SimulationSnapshot } from './Simulation';
export { compareAlgorithms } from './compare';
export type { ComparisonEntry } from './compare';
export { TimelineRecorder } from './TimelineRecorder';
export { TelemetryChannel } from './TelemetryChannel';
