import type { NodeId } from '../graph/types.js';
import type { DevtasksErrorCode } from '../shared/errors.js';

export type TaskOutcome =
  | { readonly status: 'succeeded' }
  | {
      readonly status: 'failed';
      readonly code: DevtasksErrorCode;
      readonly exitCode: number | null;
      readonly error?: string;
    }
  | { readonly status: 'skipped'; readonly code: DevtasksErrorCode.DEPENDENCY_SKIPPED; readonly dueTo: NodeId };

export interface TaskResult {
  readonly nodeId: NodeId;
  readonly packageName: string;
  readonly commandName: string;
  /** Resolved command line; absent when resolution never happened. */
  readonly command?: string;
  readonly outcome: TaskOutcome;
  readonly output?: { readonly stdout: string; readonly stderr: string };
}

export interface ResultsSummary {
  total: number;
  succeeded: number;
  failed: number;
  skipped: number;
  ok: boolean;
}
