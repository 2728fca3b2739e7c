// Results of one run, appended by the coordinating flow only after a task has finished.
import type { NodeId } from '../graph/types.js';
import type { ResultsSummary, TaskResult } from './types.js';

export class ResultsTracker {
  private readonly ordered: TaskResult[] = [];
  private readonly byNode: Map<NodeId, TaskResult> = new Map();

  record(result: TaskResult): void {
    this.ordered.push(result);
    this.byNode.set(result.nodeId, result);
  }

  has(nodeId: NodeId): boolean {
    return this.byNode.has(nodeId);
  }

  get(nodeId: NodeId): TaskResult | undefined {
    return this.byNode.get(nodeId);
  }

  getAll(): TaskResult[] {
    return [...this.ordered];
  }

  getFailed(): TaskResult[] {
    return this.ordered.filter(r => r.outcome.status === 'failed');
  }

  getSkipped(): TaskResult[] {
    return this.ordered.filter(r => r.outcome.status === 'skipped');
  }

  allSucceeded(): boolean {
    return this.ordered.every(r => r.outcome.status === 'succeeded');
  }

  summary(): ResultsSummary {
    return summarizeResults(this.ordered);
  }
}

export function summarizeResults(results: readonly TaskResult[]): ResultsSummary {
  let succeeded = 0;
  let failed = 0;
  let skipped = 0;
  for (const result of results) {
    if (result.outcome.status === 'succeeded') succeeded++;
    else if (result.outcome.status === 'failed') failed++;
    else skipped++;
  }
  return { total: results.length, succeeded, failed, skipped, ok: failed === 0 && skipped === 0 };
}
