import path from 'path';
import { z } from 'zod';
import { categorize, createDiscoveredCommand, GLOBAL_SCOPE, packageScope, WORKSPACE_SCOPE, type CategoryRule } from '../../catalog/command.js';
import type { CommandScope, DiscoveredCommand } from '../../catalog/types.js';
import type { ExecutionContext } from '../../context.js';
import type { CommandProvider } from '../types.js';
import { fileExists, readJsonFile, toPosix } from './files.js';

const packageJsonSchema = z.object({
  name: z.string().optional(),
  scripts: z.record(z.string()).optional(),
  workspaces: z.unknown().optional(),
});

export type PackageManager = 'npm' | 'pnpm' | 'yarn';

const SCRIPT_RULES: readonly CategoryRule[] = [
  ['build', ['build']],
  ['test', ['test']],
  ['quality', ['lint', 'eslint', 'format', 'prettier', 'typecheck', 'tsc']],
  ['dev', ['dev', 'start', 'serve']],
  ['deploy', ['deploy', 'release', 'publish']],
];

export function detectPackageManager(repoRoot: string): PackageManager {
  if (fileExists(path.join(repoRoot, 'pnpm-lock.yaml')) || fileExists(path.join(repoRoot, 'pnpm-workspace.yaml'))) {
    return 'pnpm';
  }
  if (fileExists(path.join(repoRoot, 'yarn.lock'))) return 'yarn';
  return 'npm';
}

/** '@scope/web' -> 'scope-web', for use inside command ids. */
export function idSafePackageName(name: string): string {
  return name.replace(/^@/, '').replace(/\//g, '-');
}

function scriptLabel(script: string, scope: CommandScope): string {
  switch (scope.kind) {
    case 'workspace': return `${script} (all)`;
    case 'package': return `${script} (${scope.name})`;
    case 'global': return script;
  }
}

function scriptDescription(script: string, scope: CommandScope): string {
  switch (scope.kind) {
    case 'workspace': return `Run ${script} script in all packages`;
    case 'package': return `Run ${script} script in ${scope.name}`;
    case 'global': return `Run ${script} script`;
  }
}

function discoverPackageScripts(
  repoRoot: string,
  packageDir: string,
  manager: PackageManager,
  scope: CommandScope
): DiscoveredCommand[] {
  const manifestPath = path.join(packageDir, 'package.json');
  if (!fileExists(manifestPath)) return [];
  const manifest = readJsonFile(manifestPath, packageJsonSchema);
  const packageName = idSafePackageName(manifest.name ?? 'package');
  const relativeDir = toPosix(path.relative(repoRoot, packageDir)) || '.';

  return Object.keys(manifest.scripts ?? {})
    .sort()
    .map(script => createDiscoveredCommand({
      id: `npm.${packageName}.${script}`,
      label: scriptLabel(script, scope),
      description: scriptDescription(script, scope),
      source: relativeDir === '.' ? 'package.json' : `${relativeDir}/package.json`,
      category: categorize(script, SCRIPT_RULES),
      scope,
      execution: { program: manager, args: ['run', script], cwd: relativeDir },
    }));
}

export const packageScriptsProvider: CommandProvider = {
  name: 'package-scripts',

  isAvailable(context: ExecutionContext): boolean {
    return context.hasExecutable('node') && fileExists(path.join(context.repoRoot, 'package.json'));
  },

  discover(context: ExecutionContext): DiscoveredCommand[] {
    const manager = detectPackageManager(context.repoRoot);
    const rootManifest = readJsonFile(path.join(context.repoRoot, 'package.json'), packageJsonSchema);
    const isWorkspace = rootManifest.workspaces !== undefined
      || fileExists(path.join(context.repoRoot, 'pnpm-workspace.yaml'));

    const commands = discoverPackageScripts(
      context.repoRoot,
      context.repoRoot,
      manager,
      isWorkspace ? WORKSPACE_SCOPE : GLOBAL_SCOPE
    );
    for (const pkg of context.packages) {
      commands.push(...discoverPackageScripts(context.repoRoot, pkg.path, manager, packageScope(pkg.name)));
    }
    return commands;
  },
};
