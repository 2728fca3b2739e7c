import type { CommandEntry, FullCommandEntry, PackageNode, SimpleCommandEntry } from './types.js';

const NO_DEPS: readonly string[] = Object.freeze([]);

function isMap<V>(value: Record<string, V> | ReadonlyMap<string, V>): value is ReadonlyMap<string, V> {
  return value instanceof Map;
}

function toMap<V>(source: Record<string, V> | ReadonlyMap<string, V> | undefined): Map<string, V> {
  if (source === undefined) return new Map();
  if (isMap(source)) return new Map(source);
  return new Map(Object.entries(source));
}

export function simpleEntry(command: string): SimpleCommandEntry {
  return Object.freeze({ kind: 'simple', command });
}

export function fullEntry(init: {
  default: string;
  deps?: readonly string[];
  variants?: Record<string, string> | ReadonlyMap<string, string>;
}): FullCommandEntry {
  const variants = toMap(init.variants);
  return Object.freeze({
    kind: 'full',
    default: init.default,
    deps: Object.freeze([...(init.deps ?? [])]),
    variants,
  });
}

export function defaultCommand(entry: CommandEntry): string {
  return entry.kind === 'simple' ? entry.command : entry.default;
}

/** Named variant, or the default when the entry has no such variant. */
export function variantCommand(entry: CommandEntry, name: string): string {
  if (entry.kind === 'simple') return entry.command;
  return entry.variants.get(name) ?? entry.default;
}

export function entryDeps(entry: CommandEntry): readonly string[] {
  return entry.kind === 'simple' ? NO_DEPS : entry.deps;
}

export function variantNames(entry: CommandEntry): string[] {
  return entry.kind === 'simple' ? [] : Array.from(entry.variants.keys()).sort();
}

export function createPackageNode(init: {
  path: string;
  name: string;
  commands?: Record<string, CommandEntry> | ReadonlyMap<string, CommandEntry>;
}): PackageNode {
  const commands = toMap(init.commands);
  return Object.freeze({ path: init.path, name: init.name, commands });
}
