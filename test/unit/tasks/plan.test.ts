import { buildGraph } from '../../../src/graph/builder.js';
import { validateGraph } from '../../../src/graph/validator.js';
import { CommandRegistry } from '../../../src/registry/registry.js';
import { ResultsTracker } from '../../../src/results/tracker.js';
import { DevtasksErrorCode } from '../../../src/shared/errors.js';
import { planExecution, readiness } from '../../../src/tasks/plan.js';
import { pkg } from '../../helpers/packages.js';

function graphFor(...packages: Parameters<typeof pkg>[]) {
  const graph = buildGraph(new CommandRegistry(packages.map(args => pkg(...args))).entries());
  return { graph, report: validateGraph(graph) };
}

describe('planExecution', () => {
  it('orders dependencies before dependents', () => {
    const { graph, report } = graphFor(
      ['a', { build: { default: 'make a', deps: ['b'] } }],
      ['b', { build: { default: 'make b', deps: ['c'] } }],
      ['c', { build: 'make c' }],
    );
    expect(planExecution(graph, report, ['a:build'])).toEqual(['c:build', 'b:build', 'a:build']);
  });

  it('visits a shared dependency once', () => {
    const { graph, report } = graphFor(
      ['web', { build: 'vite build' }],
      ['api', { build: { default: 'cargo build', deps: ['web'] } }],
      ['cli', { build: { default: 'cargo build', deps: ['web', 'api'] } }],
    );
    expect(planExecution(graph, report, ['cli:build', 'api:build'])).toEqual(['web:build', 'api:build', 'cli:build']);
  });

  it('follows qualified references into other commands', () => {
    const { graph, report } = graphFor(
      ['shared', { codegen: 'protoc' }],
      ['api', { build: { default: 'cargo build', deps: ['shared:codegen'] } }],
    );
    expect(planExecution(graph, report, ['api:build'])).toEqual(['shared:codegen', 'api:build']);
  });

  it('keeps blocked nodes without expanding them', () => {
    const { graph, report } = graphFor(
      ['a', { build: { default: 'make', deps: ['b'] } }],
      ['b', { build: { default: 'make', deps: ['a'] } }],
    );
    expect(planExecution(graph, report, ['a:build'])).toEqual(['a:build']);
  });
});

describe('readiness', () => {
  const { graph } = graphFor(
    ['web', { build: 'vite build' }],
    ['api', { build: { default: 'cargo build', deps: ['web'] } }],
  );
  const api = graph.nodes.get('api:build');

  it('waits for unfinished dependencies', () => {
    expect(api && readiness(api, new ResultsTracker(), false)).toEqual({ state: 'waiting', on: 'web:build' });
  });

  it('skips after a failed dependency unless continuing on failure', () => {
    const results = new ResultsTracker();
    results.record({
      nodeId: 'web:build',
      packageName: 'web',
      commandName: 'build',
      outcome: { status: 'failed', code: DevtasksErrorCode.COMMAND_FAILED, exitCode: 1 },
    });
    expect(api && readiness(api, results, false)).toEqual({ state: 'skip', dueTo: 'web:build' });
    expect(api && readiness(api, results, true)).toEqual({ state: 'ready' });
  });

  it('passes on the original failure through a skipped dependency', () => {
    const results = new ResultsTracker();
    results.record({
      nodeId: 'web:build',
      packageName: 'web',
      commandName: 'build',
      outcome: { status: 'skipped', code: DevtasksErrorCode.DEPENDENCY_SKIPPED, dueTo: 'gen:build' },
    });
    expect(api && readiness(api, results, false)).toEqual({ state: 'skip', dueTo: 'gen:build' });
  });
});
