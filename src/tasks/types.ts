import type { TaskResult } from '../results/types.js';
import type { VariableTable } from './template.js';

export interface RunOptions {
  /** Run in dependency waves instead of one process at a time. */
  parallel?: boolean;
  variant?: string;
  /** Limit the requested command to these packages; their dependencies still run. */
  restrictToPackages?: readonly string[];
  captureOutput?: boolean;
  /** Run dependents even when a dependency failed. */
  continueOnFailure?: boolean;
  /** Template values; checked before `env`. */
  variables?: VariableTable;
  /** Template fallback table. Defaults to process.env. */
  env?: VariableTable;
  /** Extra environment for spawned commands. */
  extraEnv?: Record<string, string>;
  onResult?: (result: TaskResult) => void;
}
