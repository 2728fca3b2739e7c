import { ResultsTracker, summarizeResults } from '../../../src/results/tracker.js';
import type { TaskResult } from '../../../src/results/types.js';
import { DevtasksErrorCode } from '../../../src/shared/errors.js';

function result(nodeId: string, outcome: TaskResult['outcome']): TaskResult {
  const [packageName, commandName] = nodeId.split(':');
  return { nodeId, packageName, commandName, outcome };
}

describe('ResultsTracker', () => {
  it('keeps results in the order they were recorded', () => {
    const tracker = new ResultsTracker();
    tracker.record(result('c:build', { status: 'succeeded' }));
    tracker.record(result('b:build', { status: 'failed', code: DevtasksErrorCode.COMMAND_FAILED, exitCode: 2 }));
    tracker.record(result('a:build', { status: 'skipped', code: DevtasksErrorCode.DEPENDENCY_SKIPPED, dueTo: 'b:build' }));

    expect(tracker.getAll().map(r => r.nodeId)).toEqual(['c:build', 'b:build', 'a:build']);
    expect(tracker.getFailed().map(r => r.nodeId)).toEqual(['b:build']);
    expect(tracker.getSkipped().map(r => r.nodeId)).toEqual(['a:build']);
    expect(tracker.allSucceeded()).toBe(false);
  });

  it('answers lookups by node id', () => {
    const tracker = new ResultsTracker();
    tracker.record(result('web:test', { status: 'succeeded' }));
    expect(tracker.has('web:test')).toBe(true);
    expect(tracker.get('web:test')?.outcome.status).toBe('succeeded');
    expect(tracker.get('api:test')).toBeUndefined();
  });

  it('getAll returns a copy', () => {
    const tracker = new ResultsTracker();
    tracker.record(result('web:test', { status: 'succeeded' }));
    tracker.getAll().pop();
    expect(tracker.getAll()).toHaveLength(1);
  });
});

describe('summarizeResults', () => {
  it('counts outcomes and is ok only when everything succeeded', () => {
    expect(summarizeResults([
      result('a:x', { status: 'succeeded' }),
      result('b:x', { status: 'failed', code: DevtasksErrorCode.SPAWN_FAILED, exitCode: null, error: 'boom' }),
      result('c:x', { status: 'skipped', code: DevtasksErrorCode.DEPENDENCY_SKIPPED, dueTo: 'b:x' }),
    ])).toEqual({ total: 3, succeeded: 1, failed: 1, skipped: 1, ok: false });

    expect(summarizeResults([result('a:x', { status: 'succeeded' })])).toEqual({
      total: 1, succeeded: 1, failed: 0, skipped: 0, ok: true,
    });
  });

  it('treats an empty run as ok', () => {
    expect(summarizeResults([]).ok).toBe(true);
  });
});
