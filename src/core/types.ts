/**
 * Core type definitions
 * Plain records shared by the engine, the policies and every consumer of a run
 */

/**
 * Scheduling algorithm identifiers
 */
export type PolicyName =
  | 'FCFS'
  | 'SJF'
  | 'SRTF'
  | 'EDF'
  | 'RR'
  | 'PRIORITY'
  | 'RMS'
  | 'LLF'
  | 'HYBRID';

/**
 * Algorithms the adaptive controller may hand control to
 */
export type DelegatePolicyName = Exclude<PolicyName, 'HYBRID'>;

/**
 * Request for a shared resource, issued once the task has executed `at` units
 */
export interface ResourceRequest {
  resourceId: string;
  at: number;
}

/**
 * Task descriptor as supplied by the caller
 */
export interface TaskSpec {
  id: string;
  arrival: number;
  burst: number;
  /** Absolute deadline */
  deadline?: number;
  /** Lower value = more urgent */
  priority: number;
  period?: number;
  /** Pin the task to one core */
  affinity?: number;
  resources: ResourceRequest[];
}

/**
 * Runtime lifecycle of a task inside one run
 */
export enum TaskState {
  PENDING = 'pending',
  READY = 'ready',
  RUNNING = 'running',
  BLOCKED = 'blocked',
  COMPLETED = 'completed',
}

/**
 * Task descriptor plus its mutable runtime state
 */
export interface RuntimeTask extends TaskSpec {
  state: TaskState;
  remaining: number;
  executed: number;
  core: number | null;
  firstStart: number | null;
  completion: number | null;
  deadlineMissed: boolean;
  /** Resource ids currently held, in acquisition order */
  held: string[];
}

/**
 * Read-only projection of a task handed to policies
 */
export type TaskView = Readonly<Omit<RuntimeTask, 'held' | 'resources'>> & {
  readonly held: readonly string[];
  readonly resources: readonly ResourceRequest[];
};

/**
 * Why an execution interval was closed
 */
export type IntervalEndReason =
  | 'completed'
  | 'preempted'
  | 'quantum'
  | 'blocked'
  | 'deadlock'
  | 'idle'
  | 'cancelled'
  /** Still running when the timeline was read */
  | 'open';

/**
 * One contiguous stretch of a core's timeline; `taskId` null means idle
 */
export interface ExecutionInterval {
  taskId: string | null;
  start: number;
  end: number;
  core: number;
  reason: IntervalEndReason;
}

/**
 * Mutual-exclusion resource
 */
export interface Resource {
  id: string;
  holder: string | null;
  waitQueue: string[];
}

/**
 * Resource descriptor as supplied by the caller
 */
export interface ResourceSpec {
  id: string;
}

/**
 * Per-core partition of the scheduler state
 */
export interface CoreState {
  index: number;
  /** Ready tasks in queue order */
  ready: string[];
  running: string | null;
  /** Consecutive units the running task has used in its current slice */
  sliceUsed: number;
}

/**
 * State exclusively owned by the engine for one run
 */
export interface SchedulerState {
  time: number;
  activePolicy: PolicyName;
  /** Hybrid runs only: the delegate currently in charge */
  delegatePolicy: DelegatePolicyName | null;
  pending: string[];
  blocked: string[];
  completed: string[];
  cores: CoreState[];
}

/**
 * Per-task metrics; null while the task is incomplete
 */
export interface TaskMetrics {
  taskId: string;
  arrival: number;
  burst: number;
  deadline: number | null;
  completion: number | null;
  turnaround: number | null;
  waiting: number | null;
  response: number | null;
  deadlineMissed: boolean;
}

/**
 * Snapshot of one core's simulated hardware status
 */
export interface CoreStatus {
  core: number;
  utilization: number;
  frequency: number;
  temperature: number;
  power: number;
}

/**
 * Aggregated metrics derived from a timeline
 */
export interface MetricsSnapshot {
  tasks: TaskMetrics[];
  totalTime: number;
  completedTasks: number;
  utilization: number;
  coreUtilization: number[];
  throughput: number;
  averageWaiting: number;
  averageTurnaround: number;
  averageResponse: number;
  missedDeadlines: number;
  missRatio: number;
  preemptions: number;
  contextSwitches: number;
  energy: number;
  peakTemperature: number;
  averageTemperature: number;
}

/**
 * Observability events emitted by the engine
 */
export type SimulationEvent =
  | { type: 'TaskArrived'; time: number; taskId: string; core: number }
  | { type: 'TaskCompleted'; time: number; taskId: string; core: number }
  | { type: 'TaskBlocked'; time: number; taskId: string; resourceId: string; holder: string }
  | { type: 'DeadlineMissed'; time: number; taskId: string; deadline: number; laxity: number }
  | {
      type: 'DeadlockResolved';
      time: number;
      cycle: string[];
      victim: string;
      released: string[];
    }
  | {
      type: 'PolicySwitched';
      time: number;
      from: DelegatePolicyName;
      to: DelegatePolicyName;
      rule: string;
    };

export type SimulationEventType = SimulationEvent['type'];

/**
 * Narrow a simulation event by its type tag
 */
export type SimulationEventOf<K extends SimulationEventType> = Extract<SimulationEvent, { type: K }>;

/**
 * How a run ended
 */
export enum RunStatus {
  RUNNING = 'running',
  COMPLETED = 'completed',
  CANCELLED = 'cancelled',
  DIVERGED = 'diverged',
}

/**
 * Result of a finished, cancelled or diverged run
 */
export interface SimulationResult {
  status: RunStatus;
  policy: PolicyName;
  timeline: ExecutionInterval[];
  events: SimulationEvent[];
  metrics: MetricsSnapshot;
  finalState: SchedulerState;
}

/**
 * Per-tick record pushed to live consumers
 */
export interface TickSnapshot {
  time: number;
  policy: PolicyName;
  delegatePolicy: DelegatePolicyName | null;
  running: Array<string | null>;
  ready: string[][];
  blocked: string[];
  completed: number;
  /** Intervals closed during this tick */
  intervals: ExecutionInterval[];
  events: SimulationEvent[];
  coreStatus: CoreStatus[];
}
