// Workspace config loader: reads .dev/config.yaml, expands workspace package
// patterns with glob, and loads each package's optional dev.yaml into a PackageNode.
// Missing files fall back to defaults; malformed files throw CONFIG_INVALID.
import fs from 'fs';
import path from 'path';
import { globSync } from 'glob';
import { parse as parseYaml } from 'yaml';
import type { z } from 'zod';
import { createPackageNode, fullEntry, simpleEntry } from '../registry/entry.js';
import type { CommandEntry, PackageNode } from '../registry/types.js';
import { DevtasksError, DevtasksErrorCode, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import {
  packageConfigSchema,
  packageManifestSchema,
  workspaceConfigSchema,
  type CommandEntryInput,
  type PackageConfig,
  type WorkspaceConfig,
} from './schema.js';

export const CONFIG_DIR = '.dev';
export const CONFIG_FILE = 'config.yaml';
export const PACKAGE_CONFIG_FILE = 'dev.yaml';

export interface LoadedWorkspace {
  repoRoot: string;
  /** Absolute path of .dev/config.yaml, or null when the repository has none. */
  configPath: string | null;
  config: WorkspaceConfig;
  packages: PackageNode[];
}

function readYamlFile<T extends z.ZodTypeAny>(filePath: string, schema: T): z.infer<T> {
  let document: unknown;
  try {
    document = parseYaml(fs.readFileSync(filePath, 'utf-8'));
  } catch (err) {
    throw new DevtasksError(DevtasksErrorCode.CONFIG_INVALID, `Failed to parse ${filePath}: ${errorMessage(err)}`);
  }
  const result = schema.safeParse(document ?? {});
  if (!result.success) {
    throw new DevtasksError(DevtasksErrorCode.CONFIG_INVALID, `Invalid configuration in ${filePath}`, {
      issues: result.error.issues.map(i => `${i.path.join('.') || '<root>'}: ${i.message}`),
    });
  }
  return result.data;
}

export function loadWorkspaceConfig(repoRoot: string): { config: WorkspaceConfig; configPath: string | null } {
  const configPath = path.join(repoRoot, CONFIG_DIR, CONFIG_FILE);
  if (!fs.existsSync(configPath)) {
    logger.debug({ configPath }, 'No workspace config found, using defaults');
    return { config: workspaceConfigSchema.parse({}), configPath: null };
  }
  return { config: readYamlFile(configPath, workspaceConfigSchema), configPath };
}

/** '@org/web' -> 'web'; unparseable manifests are ignored. */
export function inferPackageName(packageDir: string): string {
  const manifestPath = path.join(packageDir, 'package.json');
  if (fs.existsSync(manifestPath)) {
    try {
      const parsed = packageManifestSchema.safeParse(JSON.parse(fs.readFileSync(manifestPath, 'utf-8')));
      const name = parsed.success ? parsed.data.name : undefined;
      if (name) return name.startsWith('@') ? name.split('/')[1] || name : name;
    } catch (err) {
      logger.warn({ manifestPath, error: errorMessage(err) }, 'Could not read package.json, using directory name');
    }
  }
  return path.basename(packageDir);
}

export function toCommandEntry(input: CommandEntryInput): CommandEntry {
  if (typeof input === 'string') return simpleEntry(input);
  return fullEntry({ default: input.default, deps: input.deps, variants: input.variants });
}

export function loadPackage(packageDir: string): PackageNode {
  const configPath = path.join(packageDir, PACKAGE_CONFIG_FILE);
  const packageConfig: PackageConfig = fs.existsSync(configPath)
    ? readYamlFile(configPath, packageConfigSchema)
    : packageConfigSchema.parse({});

  const commands = new Map<string, CommandEntry>();
  for (const [name, input] of Object.entries(packageConfig.cmd)) {
    commands.set(name, toCommandEntry(input));
  }

  return createPackageNode({
    path: packageDir,
    name: packageConfig.name ?? inferPackageName(packageDir),
    commands,
  });
}

/** Package directories matched by the workspace patterns, minus excluded directory names. */
export function findPackageDirs(repoRoot: string, config: WorkspaceConfig): string[] {
  const excluded = new Set(config.workspaces.exclude);
  const dirs = new Set<string>();

  for (const pattern of config.workspaces.packages) {
    const matches = globSync(pattern, { cwd: repoRoot, absolute: true, withFileTypes: false });
    for (const match of matches) {
      if (!fs.statSync(match).isDirectory()) continue;
      if (excluded.has(path.basename(match))) continue;
      dirs.add(path.resolve(match));
    }
  }
  return Array.from(dirs);
}

export function loadWorkspace(repoRoot: string): LoadedWorkspace {
  const { config, configPath } = loadWorkspaceConfig(repoRoot);
  const packages = findPackageDirs(repoRoot, config)
    .map(loadPackage)
    .sort((a, b) => a.name.localeCompare(b.name));

  logger.debug({ repoRoot, packages: packages.map(p => p.name) }, 'Loaded workspace packages');
  return { repoRoot, configPath, config, packages };
}
