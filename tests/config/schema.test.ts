import { describe, it, expect } from 'vitest';
import { parseSimulationInput, validateSimulationInput } from '../../src/config/schema.js';
import { InvalidConfigError, InvalidTaskSetError } from '../../src/core/errors.js';

function captureError(run: () => unknown): unknown {
  try {
    run();
  } catch (error) {
    return error;
  }
  throw new Error('expected an error');
}

describe('simulation input schema', () => {
  it('should apply defaults', () => {
    const input = parseSimulationInput({
      tasks: [{ id: 'A', arrival: 0, burst: 2 }],
      config: { policy: 'FCFS' },
    });

    expect(input.tasks[0]).toEqual({ id: 'A', arrival: 0, burst: 2, priority: 0, resources: [] });
    expect(input.resources).toEqual([]);
    expect(input.config.cores).toBe(1);
    expect(input.config.preemptive).toBe(false);
    expect(input.config.adaptive.window).toBe(5);
    expect(input.config.adaptive.rules.map((rule) => rule.name)).toEqual(['deadline-pressure', 'queue-pressure']);
    expect(input.config.coreModel.maxFrequency).toBe(3);
  });

  it('should expand bare resource ids into requests at offset 0', () => {
    const input = parseSimulationInput({
      tasks: [{ id: 'A', arrival: 0, burst: 3, resources: ['R1', { resourceId: 'R2', at: 2 }] }],
      resources: [{ id: 'R1' }, { id: 'R2' }],
      config: { policy: 'FCFS' },
    });

    expect(input.tasks[0].resources).toEqual([
      { resourceId: 'R1', at: 0 },
      { resourceId: 'R2', at: 2 },
    ]);
  });

  it('should reject a non-positive burst as an invalid task set', () => {
    const error = captureError(() =>
      parseSimulationInput({ tasks: [{ id: 'A', arrival: 0, burst: 0 }], config: { policy: 'FCFS' } })
    );

    expect(error).toBeInstanceOf(InvalidTaskSetError);
    expect(error).toMatchObject({ issues: ['tasks.0.burst: burst must be > 0'] });
  });

  it('should reject a negative arrival', () => {
    const error = captureError(() =>
      parseSimulationInput({ tasks: [{ id: 'A', arrival: -1, burst: 1 }], config: { policy: 'FCFS' } })
    );

    expect(error).toBeInstanceOf(InvalidTaskSetError);
    expect(error).toMatchObject({ issues: ['tasks.0.arrival: arrival must be >= 0'] });
  });

  it('should reject duplicate ids and dangling resources', () => {
    const error = captureError(() =>
      parseSimulationInput({
        tasks: [
          { id: 'A', arrival: 0, burst: 1 },
          { id: 'A', arrival: 1, burst: 2, resources: ['R9'] },
        ],
        config: { policy: 'FCFS' },
      })
    );

    expect(error).toBeInstanceOf(InvalidTaskSetError);
    expect(error).toMatchObject({
      issues: ['tasks.1.id: duplicate task id "A"', 'tasks.1.resources.0: unknown resource "R9"'],
    });
  });

  it('should reject an affinity outside the core count', () => {
    const error = captureError(() =>
      parseSimulationInput({
        tasks: [{ id: 'A', arrival: 0, burst: 1, affinity: 2 }],
        config: { policy: 'FCFS', cores: 2 },
      })
    );

    expect(error).toMatchObject({ issues: ['tasks.0.affinity: affinity 2 outside 2 core(s)'] });
  });

  it('should reject a periodic task released at or after the horizon', () => {
    const error = captureError(() =>
      parseSimulationInput({
        tasks: [
          { id: 'P', arrival: 0, burst: 1, period: 4 },
          { id: 'Q', arrival: 8, burst: 1, period: 4 },
        ],
        config: { policy: 'RMS', horizon: 8 },
      })
    );

    expect(error).toBeInstanceOf(InvalidTaskSetError);
    expect(error).toMatchObject({
      issues: ['tasks.1.arrival: periodic task "Q" first released at 8, at or after horizon 8'],
    });
  });

  it('should keep a late aperiodic task when a horizon is set', () => {
    const input = parseSimulationInput({
      tasks: [{ id: 'A', arrival: 12, burst: 1 }],
      config: { policy: 'RMS', horizon: 8 },
    });

    expect(input.tasks.map((task) => task.id)).toEqual(['A']);
  });

  it('should only accept whole time units', () => {
    const error = captureError(() =>
      parseSimulationInput({
        tasks: [{ id: 'A', arrival: 0.5, burst: 1.5 }],
        config: { policy: 'FCFS' },
      })
    );

    expect(error).toBeInstanceOf(InvalidTaskSetError);
    expect(error).toMatchObject({ message: expect.stringMatching(/tasks\.0\.arrival: .*tasks\.0\.burst: /) });
  });

  it('should reject a non-positive quantum as invalid configuration', () => {
    const error = captureError(() =>
      parseSimulationInput({ tasks: [], config: { policy: 'RR', quantum: 0 } })
    );

    expect(error).toBeInstanceOf(InvalidConfigError);
    expect(error).toMatchObject({ issues: ['config.quantum: quantum must be > 0'] });
  });

  it('should reject an empty adaptive rule table', () => {
    const error = captureError(() =>
      parseSimulationInput({ tasks: [], config: { policy: 'HYBRID', adaptive: { rules: [] } } })
    );

    expect(error).toBeInstanceOf(InvalidConfigError);
    expect(error).toMatchObject({ issues: ['config.adaptive.rules: adaptive rule table must not be empty'] });
  });

  it('should reject a bad core count', () => {
    expect(() => parseSimulationInput({ tasks: [], config: { policy: 'FCFS', cores: 0 } })).toThrow(
      InvalidConfigError
    );
  });

  it('should report task problems ahead of configuration problems', () => {
    const error = captureError(() =>
      parseSimulationInput({ tasks: [{ id: 'A', arrival: 0, burst: 0 }], config: { policy: 'RR', quantum: 0 } })
    );

    expect(error).toBeInstanceOf(InvalidTaskSetError);
  });

  it('should validate without throwing', () => {
    const ok = validateSimulationInput({ tasks: [], config: { policy: 'EDF' } });
    const bad = validateSimulationInput({ tasks: [], config: { policy: 'NOPE' } });

    expect(ok.success).toBe(true);
    expect(bad.success).toBe(false);
    if (!bad.success) {
      expect(bad.error).toBeInstanceOf(InvalidConfigError);
    }
  });
});
