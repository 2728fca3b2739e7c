import fs from 'fs';
import path from 'path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { createDiscoveredCommand, GLOBAL_SCOPE } from '../../catalog/command.js';
import type { Category, DiscoveredCommand } from '../../catalog/types.js';
import type { ExecutionContext } from '../../context.js';
import { DevtasksError, DevtasksErrorCode, errorMessage } from '../../shared/errors.js';
import type { CommandProvider } from '../types.js';
import { firstExisting } from './files.js';

export const COMPOSE_FILE_NAMES = ['docker-compose.yml', 'docker-compose.yaml', 'compose.yml', 'compose.yaml'] as const;

const composeFileSchema = z.object({
  services: z.record(z.unknown()).nullish(),
}).passthrough();

interface ComposeAction {
  action: string;
  args: readonly string[];
  label: string;
  description: string;
  category: Category;
}

const GLOBAL_ACTIONS: readonly ComposeAction[] = [
  { action: 'up', args: ['up', '-d'], label: 'Start services', description: 'Start all Docker services', category: 'services' },
  { action: 'down', args: ['down'], label: 'Stop services', description: 'Stop all Docker services', category: 'services' },
  { action: 'logs', args: ['logs', '-f', '--tail', '200'], label: 'View logs', description: 'Follow logs from all containers', category: 'services' },
  { action: 'restart', args: ['restart'], label: 'Restart services', description: 'Restart Docker services', category: 'services' },
  { action: 'build', args: ['build'], label: 'Build images', description: 'Build Docker images', category: 'build' },
  { action: 'ps', args: ['ps'], label: 'Show containers', description: 'Show running containers', category: 'services' },
];

/** `docker compose` when the docker CLI is present, else the standalone binary. */
export function composeProgram(context: ExecutionContext): { program: string; baseArgs: string[] } {
  return context.hasExecutable('docker')
    ? { program: 'docker', baseArgs: ['compose'] }
    : { program: 'docker-compose', baseArgs: [] };
}

/** Service names under `services:`, sorted. */
export function parseComposeServices(content: string, source = 'compose file'): string[] {
  let document: unknown;
  try {
    document = parseYaml(content);
  } catch (err) {
    throw new DevtasksError(DevtasksErrorCode.CONFIG_INVALID, `Failed to parse ${source}: ${errorMessage(err)}`);
  }
  if (document === null || document === undefined) return [];

  const result = composeFileSchema.safeParse(document);
  if (!result.success) {
    throw new DevtasksError(DevtasksErrorCode.CONFIG_INVALID, `Unexpected shape in ${source}`, {
      issues: result.error.issues.map(i => `${i.path.join('.') || '<root>'}: ${i.message}`),
    });
  }
  return Object.keys(result.data.services ?? {}).sort();
}

export const composeProvider: CommandProvider = {
  name: 'compose',

  isAvailable(context: ExecutionContext): boolean {
    return (context.hasExecutable('docker') || context.hasExecutable('docker-compose'))
      && firstExisting(context.repoRoot, COMPOSE_FILE_NAMES) !== null;
  },

  discover(context: ExecutionContext): DiscoveredCommand[] {
    const composeFile = firstExisting(context.repoRoot, COMPOSE_FILE_NAMES);
    if (!composeFile) return [];
    const { program, baseArgs } = composeProgram(context);

    const commands = GLOBAL_ACTIONS.map(a => createDiscoveredCommand({
      id: `docker.${a.action}`,
      label: a.label,
      description: a.description,
      source: composeFile,
      category: a.category,
      scope: GLOBAL_SCOPE,
      execution: { program, args: [...baseArgs, ...a.args], cwd: '.' },
    }));

    const content = fs.readFileSync(path.join(context.repoRoot, composeFile), 'utf-8');
    for (const service of parseComposeServices(content, composeFile)) {
      commands.push(
        createDiscoveredCommand({
          id: `docker.up.${service}`,
          label: `Start ${service}`,
          description: `Start the ${service} service`,
          source: composeFile,
          category: 'services',
          scope: GLOBAL_SCOPE,
          execution: { program, args: [...baseArgs, 'up', '-d', service], cwd: '.' },
        }),
        createDiscoveredCommand({
          id: `docker.logs.${service}`,
          label: `Logs for ${service}`,
          description: `Follow logs from the ${service} service`,
          source: composeFile,
          category: 'services',
          scope: GLOBAL_SCOPE,
          execution: { program, args: [...baseArgs, 'logs', '-f', '--tail', '200', service], cwd: '.' },
        })
      );
    }
    return commands;
  },
};
