import { buildGraph, nodeId } from '../graph/builder.js';
import { validateGraph, type ValidationReport } from '../graph/validator.js';
import type { DependencyGraph, GraphNode, NodeId } from '../graph/types.js';
import { defaultCommand, variantCommand } from '../registry/entry.js';
import type { CommandRegistry } from '../registry/registry.js';
import { ResultsTracker } from '../results/tracker.js';
import type { TaskResult } from '../results/types.js';
import { ExecaProcessRunner, shellInvocation, type ProcessRunner } from '../shared/exec.js';
import { DevtasksError, DevtasksErrorCode, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { planExecution, readiness } from './plan.js';
import { resolveTemplate } from './template.js';
import type { RunOptions } from './types.js';

export interface TaskExecutorOptions {
  runner?: ProcessRunner;
}

/**
 * Runs declared commands across packages in dependency order.
 * The graph is built and validated once, when the executor is created.
 */
export class TaskExecutor {
  private readonly graph: DependencyGraph;
  private readonly report: ValidationReport;
  private readonly runner: ProcessRunner;

  constructor(private readonly registry: CommandRegistry, options: TaskExecutorOptions = {}) {
    this.graph = buildGraph(registry.entries());
    this.report = validateGraph(this.graph);
    this.runner = options.runner ?? new ExecaProcessRunner();
  }

  validation(): ValidationReport {
    return this.report;
  }

  /** The node ids `run` would visit, dependencies first. */
  plan(commandName: string, restrictToPackages: readonly string[] = []): NodeId[] {
    const roots = this.registry
      .packagesWithCommand(commandName)
      .filter(pkg => restrictToPackages.length === 0 || restrictToPackages.includes(pkg.name))
      .map(pkg => nodeId(pkg.name, commandName));
    return planExecution(this.graph, this.report, roots);
  }

  async run(commandName: string, options: RunOptions = {}): Promise<TaskResult[]> {
    const plan = this.plan(commandName, options.restrictToPackages);
    if (plan.length === 0) {
      logger.debug({ command: commandName }, 'No package defines this command');
      return [];
    }

    const blocked = plan.filter(id => this.report.blockingError(id) !== undefined);
    if (blocked.length > 0) {
      logger.warn({ command: commandName, blocked }, 'Some tasks are blocked by invalid dependencies');
    }

    const results = new ResultsTracker();
    const record = (result: TaskResult): void => {
      results.record(result);
      options.onResult?.(result);
    };

    if (options.parallel) {
      await this.runWaves(plan, options, results, record);
    } else {
      await this.runSequential(plan, options, results, record);
    }

    const summary = results.summary();
    logger.debug({ command: commandName, ...summary }, 'Run finished');
    return results.getAll();
  }

  private async runSequential(
    plan: readonly NodeId[],
    options: RunOptions,
    results: ResultsTracker,
    record: (result: TaskResult) => void
  ): Promise<void> {
    for (const id of plan) {
      const node = this.node(id);
      const settled = this.settle(node, options, results) ?? this.unreached(node, options, results);
      record(settled ?? (await this.execute(node, options)));
    }
  }

  // Each wave is every pending node whose dependencies all finished, joined
  // before the next one is computed. Blocked and skipped nodes are recorded as
  // soon as they settle, ahead of the wave they would have joined; a wave's own
  // results are appended in plan order.
  private async runWaves(
    plan: readonly NodeId[],
    options: RunOptions,
    results: ResultsTracker,
    record: (result: TaskResult) => void
  ): Promise<void> {
    let pending = [...plan];
    let waveNumber = 0;

    while (pending.length > 0) {
      let changed = true;
      while (changed) {
        changed = false;
        for (const id of pending) {
          const settled = this.settle(this.node(id), options, results);
          if (!settled) continue;
          record(settled);
          pending = pending.filter(p => p !== id);
          changed = true;
        }
      }
      if (pending.length === 0) break;

      const wave = pending.filter(
        id => readiness(this.node(id), results, options.continueOnFailure ?? false).state === 'ready'
      );
      if (wave.length === 0) {
        for (const id of pending) {
          const node = this.node(id);
          const settled = this.settle(node, options, results) ?? this.unreached(node, options, results);
          if (settled) record(settled);
        }
        break;
      }

      waveNumber++;
      logger.debug({ wave: waveNumber, tasks: wave }, 'Starting wave');
      const finished = await Promise.all(wave.map(id => this.execute(this.node(id), options)));
      for (const result of finished) record(result);
      pending = pending.filter(id => !wave.includes(id));
    }
  }

  /** A result decided without running anything: blocked by validation, or skipped. */
  private settle(node: GraphNode, options: RunOptions, results: ResultsTracker): TaskResult | null {
    const blocking = this.report.blockingIssue(node.id);
    if (blocking !== undefined) return this.failed(node, blocking.code, null, blocking.message);
    const state = readiness(node, results, options.continueOnFailure ?? false);
    if (state.state === 'skip') return this.skipped(node, state.dueTo);
    return null;
  }

  // A dependency that never produced a result counts as the reason for the skip,
  // whichever mode is running.
  private unreached(node: GraphNode, options: RunOptions, results: ResultsTracker): TaskResult | null {
    const state = readiness(node, results, options.continueOnFailure ?? false);
    if (state.state !== 'waiting') return null;
    logger.warn({ task: node.id, dependency: state.on }, 'Dependency never ran');
    return this.skipped(node, state.on);
  }

  // Never rejects: every failure becomes a TaskResult so a wave always joins completely.
  private async execute(node: GraphNode, options: RunOptions): Promise<TaskResult> {
    const template = options.variant !== undefined
      ? variantCommand(node.entry, options.variant)
      : defaultCommand(node.entry);

    let command: string;
    try {
      command = resolveTemplate(template, options.variables ?? {}, options.env ?? process.env);
    } catch (err) {
      return this.failed(node, codeOf(err, DevtasksErrorCode.MISSING_VARIABLES), null, errorMessage(err));
    }

    const pkg = this.registry.requirePackage(node.packageName);
    const capture = options.captureOutput ?? false;
    const { program, args } = shellInvocation(command);
    logger.debug({ task: node.id, command, cwd: pkg.path }, 'Running task');

    try {
      const result = await this.runner.run({ program, args, cwd: pkg.path, env: options.extraEnv, capture });
      const output = capture ? { stdout: result.stdout, stderr: result.stderr } : undefined;
      logger.debug({ task: node.id, exitCode: result.exitCode, signal: result.signal }, 'Task finished');
      if (result.exitCode === 0) {
        return { ...this.identity(node), command, outcome: { status: 'succeeded' }, output };
      }
      const error = result.signal
        ? `Command terminated by ${result.signal}: ${command}`
        : `Command exited with ${result.exitCode}: ${command}`;
      return {
        ...this.identity(node),
        command,
        outcome: { status: 'failed', code: DevtasksErrorCode.COMMAND_FAILED, exitCode: result.exitCode, error },
        output,
      };
    } catch (err) {
      return { ...this.failed(node, codeOf(err, DevtasksErrorCode.SPAWN_FAILED), null, errorMessage(err)), command };
    }
  }

  private failed(node: GraphNode, code: DevtasksErrorCode, exitCode: number | null, error: string): TaskResult {
    return { ...this.identity(node), outcome: { status: 'failed', code, exitCode, error } };
  }

  private skipped(node: GraphNode, dueTo: NodeId): TaskResult {
    return { ...this.identity(node), outcome: { status: 'skipped', code: DevtasksErrorCode.DEPENDENCY_SKIPPED, dueTo } };
  }

  private identity(node: GraphNode): Pick<TaskResult, 'nodeId' | 'packageName' | 'commandName'> {
    return { nodeId: node.id, packageName: node.packageName, commandName: node.commandName };
  }

  private node(id: NodeId): GraphNode {
    const node = this.graph.nodes.get(id);
    if (!node) throw new DevtasksError(DevtasksErrorCode.COMMAND_NOT_FOUND, `Unknown task ${id}`);
    return node;
  }
}

function codeOf(err: unknown, fallback: DevtasksErrorCode): DevtasksErrorCode {
  return err instanceof DevtasksError ? err.code : fallback;
}
