import { describe, it, expect, vi, beforeAll, afterAll, beforeEach, afterEach, type MockInstance } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { CommandHandler } from '../../src/cli/CommandHandler.js';

describe('CommandHandler', () => {
  let dir: string;
  let taskFile: string;
  let brokenFile: string;
  let handler: CommandHandler;
  let log: MockInstance;

  beforeAll(async () => {
    dir = await mkdtemp(join(tmpdir(), 'rt-sched-'));
    taskFile = join(dir, 'tasks.json');
    brokenFile = join(dir, 'broken.json');
    await writeFile(
      taskFile,
      JSON.stringify({
        tasks: [
          { id: 'A', arrival: 0, burst: 3 },
          { id: 'B', arrival: 1, burst: 2 },
        ],
        config: { policy: 'FCFS' },
      })
    );
    await writeFile(brokenFile, JSON.stringify({ tasks: [{ id: 'A', arrival: 0, burst: 0 }] }));
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  beforeEach(() => {
    handler = new CommandHandler();
    log = vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  function printedJson(): unknown {
    return JSON.parse(String(log.mock.calls[0][0]));
  }

  describe('handleRun', () => {
    it('should simulate the file and print the result as JSON', async () => {
      const result = await handler.handleRun(taskFile, { json: true });

      expect(result).toMatchObject({ success: true, message: 'FCFS finished with status completed' });
      expect(printedJson()).toMatchObject({
        status: 'completed',
        policy: 'FCFS',
        timeline: [
          { core: 0, taskId: 'A', start: 0, end: 3, reason: 'completed' },
          { core: 0, taskId: 'B', start: 3, end: 5, reason: 'completed' },
        ],
      });
    });

    it('should let options override the file config', async () => {
      await handler.handleRun(taskFile, { policy: 'RR', quantum: 1, json: true });

      expect(printedJson()).toMatchObject({ policy: 'RR' });
    });

    it('should print a summary without the json flag', async () => {
      const result = await handler.handleRun(taskFile);

      expect(result.success).toBe(true);
      expect(log.mock.calls.length).toBeGreaterThan(1);
    });

    it('should fail on a missing file', async () => {
      const result = await handler.handleRun(join(dir, 'missing.json'));

      expect(result.success).toBe(false);
      expect(result.message).toMatch(/^Run failed: /);
    });

    it('should report invalid task sets', async () => {
      const result = await handler.handleRun(brokenFile);

      expect(result.success).toBe(false);
      expect(result.message).toContain('tasks.0.burst: burst must be > 0');
    });

    it('should fail when the run exceeds its tick ceiling', async () => {
      const result = await handler.handleRun(taskFile, { maxTicks: 2 });

      expect(result).toEqual({ success: false, message: 'Run failed: Simulation did not terminate within 2 ticks' });
    });
  });

  describe('handleCompare', () => {
    it('should compare the requested policies', async () => {
      const result = await handler.handleCompare(taskFile, { policies: ['FCFS', 'SJF'], json: true });

      expect(result).toMatchObject({ success: true, message: 'Compared 2 policies' });
      expect(printedJson()).toMatchObject([
        { policy: 'FCFS', status: 'completed' },
        { policy: 'SJF', status: 'completed' },
      ]);
    });

    it('should compare every policy by default', async () => {
      const result = await handler.handleCompare(taskFile, { json: true });

      expect(result.message).toBe('Compared 9 policies');
    });

    it('should reject unknown policy names', async () => {
      const result = await handler.handleCompare(taskFile, { policies: ['BOGUS'] });

      expect(result.success).toBe(false);
      expect(result.message).toMatch(/^Compare failed: /);
    });
  });

  describe('handleGenerate', () => {
    it('should print a reproducible task set document', () => {
      const result = handler.handleGenerate({ seed: 1, count: 3, policy: 'EDF' });

      expect(result).toMatchObject({ success: true, message: 'Generated 3 tasks' });
      expect(printedJson()).toEqual(result.data);
      expect(result.data).toMatchObject({ config: { policy: 'EDF' } });
    });

    it('should reject an unknown policy', () => {
      const result = handler.handleGenerate({ seed: 1, count: 3, policy: 'FASTEST' });

      expect(result.success).toBe(false);
      expect(log).not.toHaveBeenCalled();
    });
  });

  describe('handlePolicies', () => {
    it('should list every policy', () => {
      const result = handler.handlePolicies();

      expect(result).toMatchObject({ success: true, message: '9 policies available' });
    });
  });
});
