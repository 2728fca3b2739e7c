import fs from 'fs';
import path from 'path';
import { DevtasksError, DevtasksErrorCode } from './shared/errors.js';
import { createExecutableLookup, type ExecutableLookup } from './shared/executables.js';
import type { PackageNode } from './registry/types.js';

/**
 * Everything a provider or the executor may read about the session.
 * Built once per session; nothing here is mutated after construction.
 */
export interface ExecutionContext {
  readonly repoRoot: string;
  readonly quiet: boolean;
  readonly env: Readonly<Record<string, string | undefined>>;
  /** Packages from the workspace config, used by providers that scan per package. */
  readonly packages: readonly PackageNode[];
  readonly hasExecutable: ExecutableLookup;
}

export interface CreateContextOptions {
  repoRoot?: string;
  quiet?: boolean;
  env?: Record<string, string | undefined>;
  packages?: readonly PackageNode[];
  hasExecutable?: ExecutableLookup;
}

export function createContext(options: CreateContextOptions = {}): ExecutionContext {
  const env = options.env ?? process.env;
  return Object.freeze({
    repoRoot: options.repoRoot ?? findRepoRoot(process.cwd(), env),
    quiet: options.quiet ?? false,
    env,
    packages: options.packages ?? [],
    hasExecutable: options.hasExecutable ?? createExecutableLookup(env),
  });
}

/**
 * REPO_ROOT wins when it points at an existing directory; otherwise walk up
 * from `start` to the nearest directory holding `.git` or `.dev`.
 */
export function findRepoRoot(start: string, env: Readonly<Record<string, string | undefined>> = process.env): string {
  const fromEnv = env['REPO_ROOT'];
  if (fromEnv && fs.existsSync(fromEnv)) return path.resolve(fromEnv);

  let current = path.resolve(start);
  for (;;) {
    if (fs.existsSync(path.join(current, '.git')) || fs.existsSync(path.join(current, '.dev'))) {
      return current;
    }
    const parent = path.dirname(current);
    if (parent === current) break;
    current = parent;
  }
  throw new DevtasksError(
    DevtasksErrorCode.REPO_ROOT_NOT_FOUND,
    `Repository root not found from ${start}: run inside a git repository or create a .dev/ directory`
  );
}
