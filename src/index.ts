export { createWorkspace } from './workspace.js';
export type { Workspace, WorkspaceOptions } from './workspace.js';

export { createContext, findRepoRoot } from './context.js';
export type { ExecutionContext, CreateContextOptions } from './context.js';

export {
  categorize,
  categoryLabel,
  createDiscoveredCommand,
  packageScope,
  runDiscoveredCommand,
  scopeLabel,
  GLOBAL_SCOPE,
  WORKSPACE_SCOPE,
} from './catalog/command.js';
export { CATEGORIES } from './catalog/types.js';
export type { Category, CommandScope, DiscoveredCommand, ExecutionDescriptor } from './catalog/types.js';

export { DiscoveryEngine } from './discovery/engine.js';
export type { CommandProvider } from './discovery/types.js';
export {
  cargoProvider,
  composeProvider,
  defaultProviders,
  makefileProvider,
  packageScriptsProvider,
  scriptsProvider,
} from './discovery/providers/index.js';

export { loadWorkspace, loadWorkspaceConfig, loadPackage, inferPackageName } from './config/loader.js';
export type { LoadedWorkspace } from './config/loader.js';
export type { WorkspaceConfig } from './config/schema.js';

export { CommandRegistry } from './registry/registry.js';
export { createPackageNode, entryDeps, fullEntry, simpleEntry, variantCommand } from './registry/entry.js';
export type { CommandEntry, CommandListing, FullCommandEntry, PackageNode, SimpleCommandEntry } from './registry/types.js';

export { buildGraph, normalizeDependency } from './graph/builder.js';
export { findCycles, formatCycle } from './graph/cycles.js';
export { validate, validateGraph, validateWorkspace, ValidationReport } from './graph/validator.js';
export type { ValidationIssue } from './graph/validator.js';
export type { DependencyGraph, GraphNode, NodeId } from './graph/types.js';

export { TaskExecutor } from './tasks/executor.js';
export type { RunOptions } from './tasks/types.js';
export { extractVariableNames, resolveTemplate } from './tasks/template.js';

export { ResultsTracker, summarizeResults } from './results/tracker.js';
export type { ResultsSummary, TaskOutcome, TaskResult } from './results/types.js';

export { ExecaProcessRunner } from './shared/exec.js';
export type { ProcessRequest, ProcessResult, ProcessRunner } from './shared/exec.js';
export { DevtasksError, DevtasksErrorCode, MissingVariablesError } from './shared/errors.js';
export { logger } from './shared/logger.js';
