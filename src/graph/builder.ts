import { entryDeps } from '../registry/entry.js';
import type { CommandTriple } from '../registry/types.js';
import type { DependencyGraph, GraphNode, NodeId } from './types.js';

export function nodeId(packageName: string, commandName: string): NodeId {
  return `${packageName}:${commandName}`;
}

/** Split a node id on its single ':'; anything else is not a well-formed reference. */
export function parseNodeId(id: NodeId): { packageName: string; commandName: string } | null {
  const parts = id.split(':');
  if (parts.length !== 2 || !parts[0] || !parts[1]) return null;
  return { packageName: parts[0], commandName: parts[1] };
}

/**
 * 'pkg:cmd' passes through; a bare 'pkg' means the same command name in that package.
 */
export function normalizeDependency(reference: string, referencingCommand: string): NodeId {
  return reference.includes(':') ? reference : nodeId(reference, referencingCommand);
}

export function buildGraph(triples: Iterable<CommandTriple>): DependencyGraph {
  const nodes = new Map<NodeId, GraphNode>();
  for (const { packageName, commandName, entry } of triples) {
    const rawDeps = entryDeps(entry);
    const id = nodeId(packageName, commandName);
    nodes.set(id, Object.freeze({
      id,
      packageName,
      commandName,
      entry,
      deps: Object.freeze(rawDeps.map(dep => normalizeDependency(dep, commandName))),
      rawDeps,
    }));
  }
  return { nodes };
}

export function adjacencyOf(graph: DependencyGraph): ReadonlyMap<NodeId, readonly NodeId[]> {
  const adjacency = new Map<NodeId, readonly NodeId[]>();
  for (const [id, node] of graph.nodes) adjacency.set(id, node.deps);
  return adjacency;
}
