import { AdaptiveController } from '../adaptive/AdaptiveController';
import { parseSimulationInput, type SimulationInput, type SimulationInputDescriptor } from '../config/schema';
import { DeadlockUnresolvedError, SimulationDivergenceError } from '../core/errors';
import { ResourceGraph } from '../core/ResourceGraph';
import { TaskRegistry } from '../core/TaskRegistry';
import {
  RunStatus,
  TaskState,
  type CoreState,
  type ExecutionInterval,
  type IntervalEndReason,
  type MetricsSnapshot,
  type PolicyName,
  type DelegatePolicyName,
  type Resource,
  type RuntimeTask,
  type SchedulerState,
  type SimulationEvent,
  type SimulationResult,
  type TickSnapshot,
} from '../core/types';
import { CoreStatusModel } from '../metrics/CoreStatusModel';
import { computeMetrics } from '../metrics/MetricsCollector';
import { HybridPolicy } from '../policies/HybridPolicy';
import { createPolicy } from '../policies/PolicyFactory';
import type { SchedulingPolicy } from '../policies/types';
import { DeadlockDetector } from '../scheduler/DeadlockDetector';
import { EventBus } from '../utils/event-bus';
import { createLogger } from '../utils/logger';
import { TelemetryChannel } from './TelemetryChannel';
import { TimelineRecorder } from './TimelineRecorder';

const logger = createLogger('Simulation');

/**
 * Serializable view of a run at any point
 */
export interface SimulationSnapshot {
  time: number;
  status: RunStatus;
  policy: PolicyName;
  delegatePolicy: DelegatePolicyName | null;
  tasks: RuntimeTask[];
  resources: Resource[];
  timeline: ExecutionInterval[];
  metrics: MetricsSnapshot;
}

type AcquireOutcome = 'granted' | 'blocked' | 'victim';

function copyState(state: SchedulerState): SchedulerState {
  return {
    ...state,
    pending: [...state.pending],
    blocked: [...state.blocked],
    completed: [...state.completed],
    cores: state.cores.map((core) => ({ ...core, ready: [...core.ready] })),
  };
}

/**
 * 调度仿真引擎
 * Discrete-time engine for one run: admits arrivals, asks the policy for the
 * next task on every core, executes one unit per tick and records the
 * interval log. All mutable state belongs to this instance.
 *
 * @example
 * ```ts
 * const simulation = new Simulation({ tasks, config: { policy: 'EDF' } });
 * simulation.events.on('DeadlineMissed', (event) => console.log(event.taskId));
 * const result = simulation.run();
 * ```
 */
export class Simulation {
  /** Events of each tick, published once the tick has finished */
  readonly events = new EventBus();
  /** Bounded drop-oldest feed of tick snapshots */
  readonly feed: TelemetryChannel<TickSnapshot>;

  private readonly input: SimulationInput;
  private readonly registry: TaskRegistry;
  private readonly resources: ResourceGraph;
  private readonly policy: SchedulingPolicy;
  private readonly controller: AdaptiveController | null;
  private readonly detector = new DeadlockDetector();
  private readonly recorder: TimelineRecorder;
  private readonly coreModels: CoreStatusModel[];
  private readonly state: SchedulerState;
  private readonly eventLog: SimulationEvent[] = [];

  private status: RunStatus = RunStatus.RUNNING;
  private cancelRequested = false;
  private tickEvents: SimulationEvent[] = [];
  private tickMisses: string[] = [];
  private tickPreemptions = 0;
  private completedThisTick: string[] = [];

  constructor(input: SimulationInputDescriptor) {
    this.input = parseSimulationInput(input);
    const { config } = this.input;

    this.registry = new TaskRegistry(this.input.tasks, config.horizon);
    this.resources = new ResourceGraph(this.input.resources);
    this.policy = createPolicy(config.policy, {
      quantum: config.quantum,
      preemptive: config.preemptive,
      initialPolicy: config.adaptive.initialPolicy,
    });
    this.controller = this.policy instanceof HybridPolicy ? new AdaptiveController(this.policy, config.adaptive) : null;
    this.recorder = new TimelineRecorder(config.cores);
    this.coreModels = Array.from({ length: config.cores }, () => new CoreStatusModel(config.coreModel));
    this.feed = new TelemetryChannel<TickSnapshot>(config.feedCapacity);

    const pending = [...this.registry.getAllTasks()]
      .sort((a, b) => a.arrival - b.arrival || (a.id < b.id ? -1 : a.id > b.id ? 1 : 0))
      .map((task) => task.id);

    this.state = {
      time: 0,
      activePolicy: config.policy,
      delegatePolicy: this.controller?.current ?? null,
      pending,
      blocked: [],
      completed: [],
      cores: Array.from({ length: config.cores }, (_, index) => ({ index, ready: [], running: null, sliceUsed: 0 })),
    };

    logger.debug(`Simulation created`, {
      policy: config.policy,
      tasks: this.registry.getTotalCount(),
      cores: config.cores,
    });
  }

  /**
   * Advance one tick
   * @returns the tick's snapshot, or null once the run has ended
   * @throws SimulationDivergenceError when the tick ceiling is reached
   */
  step(): TickSnapshot | null {
    if (this.status !== RunStatus.RUNNING) {
      return null;
    }
    if (this.registry.isAllCompleted()) {
      this.finish(RunStatus.COMPLETED);
      return null;
    }
    if (this.cancelRequested) {
      this.finish(RunStatus.CANCELLED);
      return null;
    }

    const { maxTicks } = this.input.config;
    if (this.state.time >= maxTicks) {
      this.finish(RunStatus.DIVERGED);
      logger.warn(`Run aborted after ${maxTicks} ticks`);
      throw new SimulationDivergenceError(maxTicks, { timeline: this.getTimeline(), metrics: this.getMetrics() });
    }

    return this.tick();
  }

  /**
   * Run until every task has completed or the run is cancelled
   */
  run(): SimulationResult {
    let snapshot = this.step();
    while (snapshot !== null) {
      snapshot = this.step();
    }
    return this.result();
  }

  /**
   * Stop before the next tick; the partial timeline and metrics stay valid
   */
  cancel(): void {
    this.cancelRequested = true;
  }

  getStatus(): RunStatus {
    return this.status;
  }

  getTime(): number {
    return this.state.time;
  }

  getTimeline(): ExecutionInterval[] {
    return this.recorder.intervals();
  }

  getMetrics(): MetricsSnapshot {
    return computeMetrics(this.registry.getAllTasks(), this.recorder.intervals(), {
      cores: this.input.config.cores,
      coreModel: this.input.config.coreModel,
    });
  }

  getEvents(): SimulationEvent[] {
    return [...this.eventLog];
  }

  snapshot(): SimulationSnapshot {
    return {
      time: this.state.time,
      status: this.status,
      policy: this.state.activePolicy,
      delegatePolicy: this.state.delegatePolicy,
      tasks: this.registry.snapshot(),
      resources: this.resources.snapshot(),
      timeline: this.getTimeline(),
      metrics: this.getMetrics(),
    };
  }

  result(): SimulationResult {
    return {
      status: this.status,
      policy: this.state.activePolicy,
      timeline: this.getTimeline(),
      events: this.getEvents(),
      metrics: this.getMetrics(),
      finalState: copyState(this.state),
    };
  }

  private tick(): TickSnapshot {
    const t = this.state.time;
    this.tickEvents = [];
    this.tickMisses = [];
    this.tickPreemptions = 0;

    this.admitArrivals(t);
    this.flagDeadlineMisses(t);
    const deadlineTasks = this.registry
      .getAllTasks()
      .filter((task) => task.deadline !== undefined && task.state !== TaskState.PENDING && task.state !== TaskState.COMPLETED)
      .map((task) => task.id);

    const busy = this.state.cores.map((core) => this.runCore(core, t));
    this.state.time = t + 1;
    this.releaseCompleted();
    this.adapt(busy, deadlineTasks);

    const coreStatus = this.coreModels.map((model, core) => ({ core, ...model.record(busy[core]) }));
    const snapshot: TickSnapshot = {
      time: t,
      policy: this.state.activePolicy,
      delegatePolicy: this.state.delegatePolicy,
      running: this.state.cores.map((core) => core.running),
      ready: this.state.cores.map((core) => [...core.ready]),
      blocked: [...this.state.blocked],
      completed: this.state.completed.length,
      intervals: this.recorder.takeClosed(),
      events: [...this.tickEvents],
      coreStatus,
    };

    this.feed.push(snapshot);
    for (const event of this.tickEvents) {
      this.events.emit(event);
    }
    return snapshot;
  }

  private publish(event: SimulationEvent): void {
    this.tickEvents.push(event);
    this.eventLog.push(event);
  }

  private coreOf(task: RuntimeTask): CoreState {
    const core = task.core === null ? undefined : this.state.cores[task.core];
    if (!core) {
      throw new Error(`Task ${task.id} has no core assigned`);
    }
    return core;
  }

  private admitArrivals(t: number): void {
    while (this.state.pending.length > 0) {
      const task = this.registry.get(this.state.pending[0]);
      if (task.arrival > t) {
        break;
      }
      this.state.pending.shift();

      const core = this.assignCore(task);
      task.state = TaskState.READY;
      task.core = core.index;
      core.ready.push(task.id);
      this.publish({ type: 'TaskArrived', time: t, taskId: task.id, core: core.index });
    }
  }

  /**
   * Affinity core, else the core with the least outstanding work
   */
  private assignCore(task: RuntimeTask): CoreState {
    if (task.affinity !== undefined) {
      return this.state.cores[task.affinity];
    }

    let best = this.state.cores[0];
    let bestLoad = Number.POSITIVE_INFINITY;
    for (const core of this.state.cores) {
      const load = this.outstandingWork(core);
      if (load < bestLoad) {
        best = core;
        bestLoad = load;
      }
    }
    return best;
  }

  private outstandingWork(core: CoreState): number {
    const ids = core.running === null ? core.ready : [...core.ready, core.running];
    const blocked = this.state.blocked.filter((taskId) => this.registry.get(taskId).core === core.index);
    return [...ids, ...blocked].reduce((sum, taskId) => sum + this.registry.get(taskId).remaining, 0);
  }

  private flagDeadlineMisses(t: number): void {
    for (const task of this.registry.getAllTasks()) {
      if (
        task.deadline === undefined ||
        task.deadlineMissed ||
        task.state === TaskState.PENDING ||
        task.state === TaskState.COMPLETED
      ) {
        continue;
      }

      const laxity = task.deadline - t - task.remaining;
      if (laxity < 0) {
        task.deadlineMissed = true;
        this.tickMisses.push(task.id);
        this.publish({ type: 'DeadlineMissed', time: t, taskId: task.id, deadline: task.deadline, laxity });
      }
    }
  }

  /**
   * Run one unit on `core`
   * @returns whether the core was busy
   */
  private runCore(core: CoreState, t: number): boolean {
    const skip = new Set<string>();
    // A preferred task only displaces the running one once it holds what it needs
    let displaced: { task: RuntimeTask; sliceUsed: number } | null = null;

    if (core.running !== null) {
      const running = this.registry.get(core.running);
      if (this.policy.quantum !== null && core.sliceUsed >= this.policy.quantum) {
        this.yieldCore(core, running, 'quantum');
      } else if (this.policy.preemptive) {
        const candidates = [...core.ready.map((taskId) => this.registry.get(taskId)), running];
        const choice = this.policy.select({ time: t, candidates, running });
        if (choice && choice.id !== running.id) {
          displaced = { task: running, sliceUsed: core.sliceUsed };
          running.state = TaskState.READY;
          core.running = null;
          core.sliceUsed = 0;
          core.ready.push(running.id);
        }
      }
    }

    if (core.running !== null) {
      const current = this.registry.get(core.running);
      if (this.acquireDue(core, current, t) === 'victim') {
        skip.add(current.id);
      }
    }

    let guard = 4 * this.registry.getTotalCount() + 4;
    while (core.running === null) {
      if (guard-- <= 0) {
        throw new DeadlockUnresolvedError([...skip]);
      }

      const candidates = core.ready.filter((taskId) => !skip.has(taskId)).map((taskId) => this.registry.get(taskId));
      const choice = this.policy.select({ time: t, candidates, running: null });
      if (!choice) {
        break;
      }

      const task = this.registry.get(choice.id);
      core.ready.splice(core.ready.indexOf(task.id), 1);
      task.state = TaskState.RUNNING;
      core.running = task.id;
      core.sliceUsed = 0;

      if (displaced !== null && displaced.task.id === task.id) {
        // resumed in the same tick: the open interval carries on
        core.sliceUsed = displaced.sliceUsed;
        displaced = null;
      }

      const outcome = this.acquireDue(core, task, t);
      if (outcome === 'victim') {
        skip.add(task.id);
      } else if (outcome === 'granted' && displaced !== null) {
        this.recorder.closeTask(core.index, displaced.task.id, 'preempted');
        this.tickPreemptions++;
        displaced = null;
      }
    }

    if (core.running === null) {
      this.recorder.record(core.index, null, t);
      return false;
    }

    this.execute(core, this.registry.get(core.running), t);
    return true;
  }

  private yieldCore(core: CoreState, task: RuntimeTask, reason: IntervalEndReason): void {
    this.recorder.closeTask(core.index, task.id, reason);
    task.state = TaskState.READY;
    core.running = null;
    core.sliceUsed = 0;
    core.ready.push(task.id);
    this.tickPreemptions++;
  }

  /**
   * Acquire every resource the task needs before its next unit
   */
  private acquireDue(core: CoreState, task: RuntimeTask, t: number): AcquireOutcome {
    for (const request of task.resources) {
      if (request.at > task.executed || task.held.includes(request.resourceId)) {
        continue;
      }

      const result = this.resources.request(request.resourceId, task.id);
      if (result.granted) {
        task.held.push(request.resourceId);
        continue;
      }

      task.state = TaskState.BLOCKED;
      core.running = null;
      core.sliceUsed = 0;
      this.state.blocked.push(task.id);
      this.publish({ type: 'TaskBlocked', time: t, taskId: task.id, resourceId: request.resourceId, holder: result.holder });

      const resolutions = this.detector.resolve(
        this.resources,
        (taskId) => this.registry.get(taskId),
        (victim) => this.preemptVictim(victim),
        this.registry.getTotalCount()
      );
      for (const resolution of resolutions) {
        this.publish({ type: 'DeadlockResolved', time: t, ...resolution });
      }

      const wasVictim = resolutions.some((resolution) => resolution.victim === task.id);
      this.recorder.closeTask(core.index, task.id, wasVictim ? 'deadlock' : 'blocked');
      return wasVictim ? 'victim' : 'blocked';
    }

    return 'granted';
  }

  /**
   * Take every resource away from a deadlock victim and return it to ready
   */
  private preemptVictim(victimId: string): string[] {
    const victim = this.registry.get(victimId);
    this.resources.withdraw(victimId);
    this.state.blocked = this.state.blocked.filter((taskId) => taskId !== victimId);

    const released = [...victim.held];
    victim.held = [];
    for (const resourceId of released) {
      this.handOff(resourceId, victimId);
    }

    victim.state = TaskState.READY;
    this.coreOf(victim).ready.push(victimId);
    return released;
  }

  /**
   * Release a resource straight to the head of its wait queue
   */
  private handOff(resourceId: string, fromId: string): void {
    const next = this.resources.release(resourceId, fromId);
    if (next === null) {
      return;
    }

    const grantee = this.registry.get(next);
    grantee.held.push(resourceId);
    grantee.state = TaskState.READY;
    this.state.blocked = this.state.blocked.filter((taskId) => taskId !== next);
    this.coreOf(grantee).ready.push(next);
  }

  private execute(core: CoreState, task: RuntimeTask, t: number): void {
    task.remaining--;
    task.executed++;
    if (task.firstStart === null) {
      task.firstStart = t;
    }
    core.sliceUsed++;
    this.recorder.record(core.index, task.id, t);

    if (task.remaining > 0) {
      return;
    }

    task.completion = t + 1;
    task.state = TaskState.COMPLETED;
    core.running = null;
    core.sliceUsed = 0;
    this.state.completed.push(task.id);
    this.recorder.closeTask(core.index, task.id, 'completed');
    this.completedThisTick.push(task.id);
    this.publish({ type: 'TaskCompleted', time: t + 1, taskId: task.id, core: core.index });
  }

  /**
   * Resources of tasks that completed this tick are handed over after every
   * core has run, so no resource serves two tasks within one tick
   */
  private releaseCompleted(): void {
    for (const taskId of this.completedThisTick) {
      const task = this.registry.get(taskId);
      const held = task.held;
      task.held = [];
      for (const resourceId of held) {
        this.handOff(resourceId, taskId);
      }
    }
    this.completedThisTick = [];
  }

  private adapt(busy: readonly boolean[], deadlineTasks: readonly string[]): void {
    if (!this.controller) {
      return;
    }

    this.controller.observe({
      busyCores: busy.filter(Boolean).length,
      cores: busy.length,
      preemptions: this.tickPreemptions,
      missed: this.tickMisses,
      deadlineTasks,
    });

    const time = this.state.time;
    if (time % this.controller.window !== 0) {
      return;
    }

    const readyRemaining = this.state.cores.flatMap((core) =>
      core.ready.map((taskId) => this.registry.get(taskId).remaining)
    );
    const change = this.controller.evaluate(time, readyRemaining);
    if (change) {
      this.state.delegatePolicy = change.to;
      this.publish({ type: 'PolicySwitched', time, from: change.from, to: change.to, rule: change.rule });
    }
  }

  private finish(status: RunStatus): void {
    this.status = status;
    this.recorder.closeAll(status === RunStatus.COMPLETED ? 'completed' : 'cancelled');
    this.feed.close();
    logger.info(`Run ${status} at t=${this.state.time}`, { policy: this.state.activePolicy });
  }
}

/**
 * Validate the input and run it to the end
 */
export function simulate(input: SimulationInputDescriptor): SimulationResult {
  return new Simulation(input).run();
}
