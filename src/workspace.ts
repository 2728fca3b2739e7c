import { loadWorkspace, type LoadedWorkspace } from './config/loader.js';
import { createContext, findRepoRoot, type ExecutionContext } from './context.js';
import type { DiscoveredCommand } from './catalog/types.js';
import { DiscoveryEngine } from './discovery/engine.js';
import { defaultProviders } from './discovery/providers/index.js';
import type { CommandProvider } from './discovery/types.js';
import { validateWorkspace, type ValidationReport } from './graph/validator.js';
import { CommandRegistry } from './registry/registry.js';
import type { TaskResult } from './results/types.js';
import type { ProcessRunner } from './shared/exec.js';
import type { ExecutableLookup } from './shared/executables.js';
import { TaskExecutor } from './tasks/executor.js';
import type { RunOptions } from './tasks/types.js';

export interface WorkspaceOptions {
  /** Defaults to the root found from the current directory. */
  repoRoot?: string;
  /** Capture child output instead of streaming it, unless a run asks otherwise. */
  quiet?: boolean;
  env?: Record<string, string | undefined>;
  providers?: readonly CommandProvider[];
  runner?: ProcessRunner;
  hasExecutable?: ExecutableLookup;
}

export interface Workspace {
  readonly context: ExecutionContext;
  readonly loaded: LoadedWorkspace;
  readonly registry: CommandRegistry;
  readonly engine: DiscoveryEngine;
  readonly executor: TaskExecutor;
  discover(): readonly DiscoveredCommand[];
  validate(): ValidationReport;
  run(commandName: string, options?: RunOptions): Promise<TaskResult[]>;
}

/**
 * Load the workspace config once and wire discovery, the command registry
 * and the task executor around it.
 */
export function createWorkspace(options: WorkspaceOptions = {}): Workspace {
  const env = options.env ?? process.env;
  const repoRoot = options.repoRoot ?? findRepoRoot(process.cwd(), env);
  const loaded = loadWorkspace(repoRoot);
  const context = createContext({
    repoRoot,
    quiet: options.quiet,
    env,
    packages: loaded.packages,
    hasExecutable: options.hasExecutable,
  });
  const registry = new CommandRegistry(loaded.packages);
  const engine = new DiscoveryEngine(options.providers ?? defaultProviders());
  const executor = new TaskExecutor(registry, { runner: options.runner });

  return {
    context,
    loaded,
    registry,
    engine,
    executor,
    discover: () => engine.discover(context),
    validate: () => validateWorkspace(registry, loaded.config.services),
    run: (commandName, runOptions = {}) => executor.run(commandName, { env, captureOutput: context.quiet, ...runOptions }),
  };
}
