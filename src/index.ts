/**
 * rt-sched-sim - 主入口
 *
 * 实时 CPU 调度仿真
 * - engine: 离散时钟、时间线与遥测通道
 * - policies: FCFS / SJF / SRTF / EDF / RR / PRIORITY / RMS / LLF / HYBRID
 * - scheduler: 等待图与死锁处理
 * - adaptive: HYBRID 的规则表控制器
 * - metrics: 指标推导与核心状态模型
 */

// 核心模块
export * from './core/index';

// 配置校验
export * from './config/schema';

// 仿真引擎
export * from './engine/index';

// 调度策略
export * from './policies/index';

// 死锁处理
export * from './scheduler/index';

// 自适应控制
export * from './adaptive/index';

// 指标
export * from './metrics/index';

// 负载生成
export * from './workload/index';

// 工具模块
export * from './utils/index';
