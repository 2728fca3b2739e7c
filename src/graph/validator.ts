import type { CommandRegistry } from '../registry/registry.js';
import { DevtasksErrorCode } from '../shared/errors.js';
import { adjacencyOf, buildGraph, parseNodeId } from './builder.js';
import { findCycles, formatCycle } from './cycles.js';
import type { DependencyGraph, NodeId, UnresolvedReference } from './types.js';

export interface ValidationIssue {
  readonly code: DevtasksErrorCode.INVALID_DEPENDENCY | DevtasksErrorCode.CIRCULAR_DEPENDENCY;
  readonly message: string;
  /** Nodes this issue blocks. */
  readonly nodes: readonly NodeId[];
}

export class ValidationReport {
  readonly errors: string[] = [];
  readonly warnings: string[] = [];
  readonly issues: ValidationIssue[] = [];
  readonly cycles: NodeId[][] = [];
  readonly unresolved: UnresolvedReference[] = [];
  /** First blocking issue per node; the executor refuses to run these. */
  private readonly blocking = new Map<NodeId, ValidationIssue>();

  isValid(): boolean {
    return this.errors.length === 0;
  }

  addError(error: string): void {
    this.errors.push(error);
  }

  addWarning(warning: string): void {
    this.warnings.push(warning);
  }

  addUnresolved(ref: UnresolvedReference): void {
    this.unresolved.push(ref);
    this.addIssue({
      code: DevtasksErrorCode.INVALID_DEPENDENCY,
      message: `Invalid dependency '${ref.reference}' in ${ref.source} - dependency not found`,
      nodes: [ref.source],
    });
  }

  addCycle(cycle: NodeId[]): void {
    this.cycles.push(cycle);
    this.addIssue({
      code: DevtasksErrorCode.CIRCULAR_DEPENDENCY,
      message: `Circular dependency detected: ${formatCycle(cycle)}`,
      nodes: cycle.slice(0, -1),
    });
  }

  blockingIssue(node: NodeId): ValidationIssue | undefined {
    return this.blocking.get(node);
  }

  blockingError(node: NodeId): string | undefined {
    return this.blocking.get(node)?.message;
  }

  blockedNodes(): NodeId[] {
    return Array.from(this.blocking.keys());
  }

  private addIssue(issue: ValidationIssue): void {
    this.issues.push(issue);
    this.addError(issue.message);
    for (const node of issue.nodes) {
      if (!this.blocking.has(node)) this.blocking.set(node, issue);
    }
  }
}

/**
 * Existence and acyclicity checks over an already-built graph.
 * Both checks always run; every problem lands in the report.
 */
export function validateGraph(graph: DependencyGraph): ValidationReport {
  const report = new ValidationReport();

  for (const node of graph.nodes.values()) {
    node.deps.forEach((dep, i) => {
      if (parseNodeId(dep) === null || !graph.nodes.has(dep)) {
        report.addUnresolved({ source: node.id, reference: node.rawDeps[i], normalized: dep });
      }
    });
  }

  for (const cycle of findCycles(adjacencyOf(graph))) {
    report.addCycle(cycle);
  }

  return report;
}

export function validate(registry: CommandRegistry): ValidationReport {
  return validateGraph(buildGraph(registry.entries()));
}

/**
 * Graph validation plus workspace-level warnings. Warnings never block execution.
 */
export function validateWorkspace(
  registry: CommandRegistry,
  services: Readonly<Record<string, number>> = {}
): ValidationReport {
  const report = validate(registry);

  const byPort = new Map<number, string[]>();
  for (const [service, port] of Object.entries(services)) {
    const names = byPort.get(port) ?? [];
    names.push(service);
    byPort.set(port, names);
  }
  for (const [port, names] of byPort) {
    if (names.length > 1) {
      report.addWarning(`Port ${port} is used by multiple services: ${names.join(', ')}`);
    }
  }

  if (registry.packages().length === 0) {
    report.addWarning('No packages found. Check your workspace patterns in .dev/config.yaml');
  }

  return report;
}
