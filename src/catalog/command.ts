import path from 'path';
import type { ExecutionContext } from '../context.js';
import type { ProcessResult, ProcessRunner } from '../shared/exec.js';
import type { Category, CommandScope, DiscoveredCommand, ExecutionDescriptor } from './types.js';

export const WORKSPACE_SCOPE: CommandScope = Object.freeze({ kind: 'workspace' });
export const GLOBAL_SCOPE: CommandScope = Object.freeze({ kind: 'global' });

export function packageScope(name: string): CommandScope {
  return Object.freeze({ kind: 'package', name });
}

export function scopeLabel(scope: CommandScope): string {
  switch (scope.kind) {
    case 'workspace': return 'workspace';
    case 'package': return scope.name;
    case 'global': return 'global';
  }
}

const CATEGORY_LABELS: Record<Category, string> = {
  build: 'Build',
  test: 'Test',
  quality: 'Quality',
  services: 'Services',
  database: 'Database',
  dev: 'Development',
  deploy: 'Deploy',
  git: 'Git',
  dependencies: 'Dependencies',
  scripts: 'Scripts',
  other: 'Other',
};

export function categoryLabel(category: Category): string {
  return CATEGORY_LABELS[category];
}

export interface DiscoveredCommandInit {
  id: string;
  label: string;
  category: Category;
  execution: { program: string; args: readonly string[]; cwd?: string };
  description?: string;
  source?: string;
  scope?: CommandScope;
}

export function createDiscoveredCommand(init: DiscoveredCommandInit): DiscoveredCommand {
  const execution: ExecutionDescriptor = Object.freeze({
    program: init.execution.program,
    args: Object.freeze([...init.execution.args]),
    cwd: init.execution.cwd ?? '.',
  });
  return Object.freeze({
    id: init.id,
    label: init.label,
    description: init.description ?? '',
    source: init.source ?? '',
    category: init.category,
    scope: init.scope ?? GLOBAL_SCOPE,
    execution,
  });
}

/** First rule whose keywords appear in `name` wins; rules are checked in order. */
export type CategoryRule = readonly [Category, readonly string[]];

export function categorize(name: string, rules: readonly CategoryRule[], fallback: Category = 'scripts'): Category {
  const lower = name.toLowerCase();
  for (const [category, keywords] of rules) {
    if (keywords.some(k => lower.includes(k))) return category;
  }
  return fallback;
}

/** Run a discovered command from its descriptor; cwd resolves against the repository root. */
export function runDiscoveredCommand(
  command: DiscoveredCommand,
  context: Pick<ExecutionContext, 'repoRoot'>,
  runner: ProcessRunner,
  options: { capture?: boolean; env?: Record<string, string> } = {}
): Promise<ProcessResult> {
  return runner.run({
    program: command.execution.program,
    args: [...command.execution.args],
    cwd: path.resolve(context.repoRoot, command.execution.cwd),
    env: options.env,
    capture: options.capture ?? false,
  });
}
