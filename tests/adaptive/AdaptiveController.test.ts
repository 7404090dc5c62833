import { describe, it, expect, beforeEach } from 'vitest';
import { AdaptiveController, type TickSample } from '../../src/adaptive/AdaptiveController.js';
import { DEFAULT_ADAPTIVE_RULES } from '../../src/adaptive/rules.js';
import { createHybridPolicy } from '../../src/policies/PolicyFactory.js';
import type { HybridPolicy } from '../../src/policies/HybridPolicy.js';

function sample(overrides: Partial<TickSample>): TickSample {
  return { busyCores: 1, cores: 1, preemptions: 0, missed: [], deadlineTasks: [], ...overrides };
}

describe('AdaptiveController', () => {
  let hybrid: HybridPolicy;
  let controller: AdaptiveController;

  beforeEach(() => {
    hybrid = createHybridPolicy({ quantum: 2, preemptive: false });
    controller = new AdaptiveController(hybrid, {
      window: 2,
      initialPolicy: 'SJF',
      rules: DEFAULT_ADAPTIVE_RULES,
      fallback: 'PRIORITY',
    });
  });

  it('should start with the configured delegate', () => {
    expect(controller.current).toBe('SJF');
    expect(hybrid.current).toBe('SJF');
    expect(controller.window).toBe(2);
  });

  it('should switch to EDF when the window misses deadlines', () => {
    controller.observe(sample({ missed: ['A'], deadlineTasks: ['A', 'B'] }));
    controller.observe(sample({ busyCores: 0, deadlineTasks: ['A', 'B'] }));

    const change = controller.evaluate(2, [1, 3]);

    expect(change).toEqual({
      from: 'SJF',
      to: 'EDF',
      rule: 'deadline-pressure',
      metrics: {
        windowStart: 0,
        windowEnd: 2,
        readyQueueLength: 2,
        missRate: 0.5,
        preemptions: 0,
        burstSpread: 0.5,
        utilization: 0.5,
      },
    });
    expect(hybrid.current).toBe('EDF');
  });

  it('should switch to SRTF for a long uneven ready queue', () => {
    controller.observe(sample({}));
    // mean 2.8, standard deviation 3.6
    const change = controller.evaluate(2, [1, 1, 1, 1, 10]);

    expect(change?.to).toBe('SRTF');
    expect(change?.metrics.burstSpread).toBeCloseTo(3.6 / 2.8);
  });

  it('should start every window afresh', () => {
    controller.observe(sample({ missed: ['A'], deadlineTasks: ['A'] }));
    controller.evaluate(2, []);

    const change = controller.evaluate(4, []);
    expect(change).toMatchObject({ from: 'EDF', to: 'PRIORITY', rule: 'fallback' });
    expect(controller.getLastMetrics()).toMatchObject({ windowStart: 2, windowEnd: 4, missRate: 0 });
  });

  it('should return null while the delegate stays the same', () => {
    controller.evaluate(2, []);
    expect(controller.evaluate(4, [])).toBeNull();
    expect(hybrid.current).toBe('PRIORITY');
  });
});
