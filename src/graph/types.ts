import type { CommandEntry } from '../registry/types.js';

/** 'package:command' */
export type NodeId = string;

export interface GraphNode {
  readonly id: NodeId;
  readonly packageName: string;
  readonly commandName: string;
  readonly entry: CommandEntry;
  /** Normalized dependency ids, in declaration order. */
  readonly deps: readonly NodeId[];
  /** Declared references, index-aligned with `deps`. */
  readonly rawDeps: readonly string[];
}

export interface DependencyGraph {
  readonly nodes: ReadonlyMap<NodeId, GraphNode>;
}

export interface UnresolvedReference {
  readonly source: NodeId;
  readonly reference: string;
  readonly normalized: NodeId;
}
