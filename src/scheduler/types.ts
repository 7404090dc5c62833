/**
 * 死锁处理类型定义
 */

/**
 * One broken wait-for cycle
 */
export interface DeadlockResolution {
  /** Task ids along the cycle, in wait order */
  cycle: string[];
  victim: string;
  /** Resources the victim had to give up */
  released: string[];
}
