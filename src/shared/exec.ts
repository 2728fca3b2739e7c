import execa from 'execa';
import { DevtasksError, DevtasksErrorCode, errorMessage } from './errors.js';

export interface ProcessRequest {
  program: string;
  args: string[];
  cwd: string;
  env?: Record<string, string>;
  /** Buffer stdout/stderr instead of inheriting the parent's streams. */
  capture: boolean;
}

export interface ProcessResult {
  stdout: string;
  stderr: string;
  /** null when the child never produced an exit status (killed by a signal). */
  exitCode: number | null;
  signal?: string;
}

/** The single seam between task execution and the OS. */
export interface ProcessRunner {
  run(request: ProcessRequest): Promise<ProcessResult>;
}

export class ExecaProcessRunner implements ProcessRunner {
  async run(request: ProcessRequest): Promise<ProcessResult> {
    try {
      const result = await execa(request.program, request.args, {
        cwd: request.cwd,
        env: request.env,
        stdio: request.capture ? 'pipe' : 'inherit',
        reject: false,
      });
      if (result.failed && result.exitCode === undefined && !result.signal) {
        throw new DevtasksError(DevtasksErrorCode.SPAWN_FAILED, `Command failed to spawn: ${request.program}`, {
          cwd: request.cwd,
          cause: 'shortMessage' in result ? String(result.shortMessage) : undefined,
        });
      }
      return {
        stdout: result.stdout ?? '',
        stderr: result.stderr ?? '',
        exitCode: result.signal ? null : result.exitCode ?? 1,
        signal: result.signal ?? undefined,
      };
    } catch (err) {
      if (err instanceof DevtasksError) throw err;
      throw new DevtasksError(DevtasksErrorCode.SPAWN_FAILED, `Command failed to spawn: ${request.program}`, {
        cwd: request.cwd,
        cause: errorMessage(err),
      });
    }
  }
}

/**
 * Descriptor that runs a command string through the platform shell.
 * Declared commands are free-form shell lines, so they are never split on whitespace here.
 */
export function shellInvocation(command: string, platform: NodeJS.Platform = process.platform): { program: string; args: string[] } {
  if (platform === 'win32') {
    return { program: process.env['ComSpec'] ?? 'cmd.exe', args: ['/d', '/s', '/c', command] };
  }
  return { program: '/bin/sh', args: ['-c', command] };
}
