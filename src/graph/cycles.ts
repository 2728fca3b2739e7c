import type { NodeId } from './types.js';

interface Frame {
  node: NodeId;
  next: number;
}

/**
 * Depth-first search from `start` with an explicit stack. Every back-edge met
 * on the way closes a cycle, returned as [first, ..., first]; the search
 * carries on past each one.
 */
export function findCyclesFrom(adjacency: ReadonlyMap<NodeId, readonly NodeId[]>, start: NodeId): NodeId[][] {
  const cycles: NodeId[][] = [];
  const visited = new Set<NodeId>([start]);
  const path: NodeId[] = [start];
  const onPath = new Map<NodeId, number>([[start, 0]]);
  const stack: Frame[] = [{ node: start, next: 0 }];

  while (stack.length > 0) {
    const frame = stack[stack.length - 1];
    const deps = adjacency.get(frame.node) ?? [];
    if (frame.next >= deps.length) {
      stack.pop();
      path.pop();
      onPath.delete(frame.node);
      continue;
    }
    const dep = deps[frame.next];
    frame.next += 1;

    const position = onPath.get(dep);
    if (position !== undefined) {
      cycles.push([...path.slice(position), dep]);
      continue;
    }
    if (visited.has(dep)) continue;

    visited.add(dep);
    onPath.set(dep, path.length);
    path.push(dep);
    stack.push({ node: dep, next: 0 });
  }
  return cycles;
}

// Rotations of one cycle share a key: members starting at the smallest id.
function cycleKey(cycle: readonly NodeId[]): string {
  const members = cycle.slice(0, -1);
  let pivot = 0;
  for (let i = 1; i < members.length; i++) {
    if (members[i] < members[pivot]) pivot = i;
  }
  return [...members.slice(pivot), ...members.slice(0, pivot)].join('\u0000');
}

/**
 * Every distinct back-edge cycle, searching from each node in iteration order.
 * A node on any cycle is the root of one search, and that search closes a
 * cycle through it, so every such node appears in at least one result.
 */
export function findCycles(adjacency: ReadonlyMap<NodeId, readonly NodeId[]>): NodeId[][] {
  const seen = new Set<string>();
  const cycles: NodeId[][] = [];
  for (const start of adjacency.keys()) {
    for (const cycle of findCyclesFrom(adjacency, start)) {
      const key = cycleKey(cycle);
      if (seen.has(key)) continue;
      seen.add(key);
      cycles.push(cycle);
    }
  }
  return cycles;
}

export function formatCycle(cycle: readonly NodeId[]): string {
  return cycle.join(' -> ');
}
