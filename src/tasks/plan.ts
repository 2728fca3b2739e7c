import type { ValidationReport } from '../graph/validator.js';
import type { DependencyGraph, GraphNode, NodeId } from '../graph/types.js';
import type { ResultsTracker } from '../results/tracker.js';

/**
 * Post-order expansion of `roots` through the graph: every dependency precedes
 * its dependents and each node appears once. Nodes the report blocks (cycles,
 * unresolved references) are kept but not expanded.
 */
export function planExecution(graph: DependencyGraph, report: ValidationReport, roots: readonly NodeId[]): NodeId[] {
  const order: NodeId[] = [];
  const done = new Set<NodeId>();
  const active = new Set<NodeId>();

  const visit = (id: NodeId): void => {
    if (done.has(id) || active.has(id)) return;
    const node = graph.nodes.get(id);
    if (!node) return;
    active.add(id);
    if (report.blockingError(id) === undefined) {
      for (const dep of node.deps) visit(dep);
    }
    active.delete(id);
    done.add(id);
    order.push(id);
  };

  for (const root of roots) visit(root);
  return order;
}

export type Readiness =
  | { state: 'ready' }
  | { state: 'waiting'; on: NodeId }
  | { state: 'skip'; dueTo: NodeId };

/**
 * Whether `node` can start given the results so far. A skipped dependency
 * passes on the node that originally failed.
 */
export function readiness(node: GraphNode, results: ResultsTracker, continueOnFailure: boolean): Readiness {
  for (const dep of node.deps) {
    const result = results.get(dep);
    if (!result) return { state: 'waiting', on: dep };
    if (continueOnFailure) continue;
    if (result.outcome.status === 'failed') return { state: 'skip', dueTo: dep };
    if (result.outcome.status === 'skipped') return { state: 'skip', dueTo: result.outcome.dueTo };
  }
  return { state: 'ready' };
}
