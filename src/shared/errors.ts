export enum DevtasksErrorCode {
  CONFIG_INVALID = 'CONFIG_INVALID',
  INVALID_DEPENDENCY = 'INVALID_DEPENDENCY',
  CIRCULAR_DEPENDENCY = 'CIRCULAR_DEPENDENCY',
  MISSING_VARIABLES = 'MISSING_VARIABLES',
  SPAWN_FAILED = 'SPAWN_FAILED',
  COMMAND_FAILED = 'COMMAND_FAILED',
  DEPENDENCY_SKIPPED = 'DEPENDENCY_SKIPPED',
  PACKAGE_NOT_FOUND = 'PACKAGE_NOT_FOUND',
  COMMAND_NOT_FOUND = 'COMMAND_NOT_FOUND',
  REPO_ROOT_NOT_FOUND = 'REPO_ROOT_NOT_FOUND',
}

export class DevtasksError extends Error {
  readonly code: DevtasksErrorCode;
  readonly context?: Record<string, unknown>;

  constructor(code: DevtasksErrorCode, message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = 'DevtasksError';
    this.code = code;
    this.context = context;
  }
}

/** Raised when a command template still has placeholders after substitution. */
export class MissingVariablesError extends DevtasksError {
  readonly names: readonly string[];

  constructor(names: readonly string[]) {
    super(
      DevtasksErrorCode.MISSING_VARIABLES,
      `Missing template variables: ${names.join(', ')}. Set them in your config or environment.`,
      { names: [...names] }
    );
    this.name = 'MissingVariablesError';
    this.names = names;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
