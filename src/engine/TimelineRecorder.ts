import type { ExecutionInterval, IntervalEndReason } from '../core/types';

function byStartThenCore(a: ExecutionInterval, b: ExecutionInterval): number {
  return a.start - b.start || a.core - b.core;
}

/**
 * 时间线记录器
 * Append-only interval log; consecutive unit slices of one task on one core
 * are coalesced until something closes the interval.
 */
export class TimelineRecorder {
  private closed: ExecutionInterval[] = [];
  private open: Array<ExecutionInterval | null>;
  private unread: ExecutionInterval[] = [];

  constructor(cores: number) {
    this.open = new Array<ExecutionInterval | null>(cores).fill(null);
  }

  /**
   * Record one unit on `core` starting at `time`; `taskId` null is an idle unit
   */
  record(core: number, taskId: string | null, time: number): void {
    const current = this.open[core];
    if (current && current.taskId === taskId && current.end === time) {
      current.end = time + 1;
      return;
    }

    if (current) {
      this.close(core, current.taskId === null ? 'idle' : 'preempted');
    }
    this.open[core] = { taskId, start: time, end: time + 1, core, reason: 'open' };
  }

  /**
   * Close the open interval of `core` if it belongs to `taskId`
   */
  closeTask(core: number, taskId: string, reason: IntervalEndReason): boolean {
    const current = this.open[core];
    if (!current || current.taskId !== taskId) {
      return false;
    }
    this.close(core, reason);
    return true;
  }

  /**
   * Close every open interval; idle stretches always end as `idle`
   */
  closeAll(taskReason: IntervalEndReason): void {
    this.open.forEach((current, core) => {
      if (current) {
        this.close(core, current.taskId === null ? 'idle' : taskReason);
      }
    });
  }

  /**
   * Intervals closed since the previous call
   */
  takeClosed(): ExecutionInterval[] {
    const taken = this.unread;
    this.unread = [];
    return taken;
  }

  /**
   * Closed intervals plus copies of the open ones, ordered by start then core
   */
  intervals(): ExecutionInterval[] {
    const open = this.open.filter((current): current is ExecutionInterval => current !== null);
    return [...this.closed, ...open]
      .map((interval) => ({ ...interval }))
      .sort(byStartThenCore);
  }

  private close(core: number, reason: IntervalEndReason): void {
    const current = this.open[core];
    if (!current) {
      return;
    }
    const interval: ExecutionInterval = { ...current, reason };
    this.closed.push(interval);
    this.unread.push({ ...interval });
    this.open[core] = null;
  }
}
