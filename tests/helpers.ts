import { TaskState, type TaskView } from '../src/core/types.js';

/**
 * Build a ready task view with sensible defaults
 */
export function makeView(overrides: Partial<TaskView> & { id: string }): TaskView {
  const burst = overrides.burst ?? 1;
  return {
    arrival: 0,
    burst,
    priority: 0,
    resources: [],
    state: TaskState.READY,
    remaining: burst,
    executed: 0,
    core: 0,
    firstStart: null,
    completion: null,
    deadlineMissed: false,
    held: [],
    ...overrides,
  };
}
