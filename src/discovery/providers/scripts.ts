import fs from 'fs';
import path from 'path';
import ignore from 'ignore';
import { categorize, createDiscoveredCommand, GLOBAL_SCOPE, type CategoryRule } from '../../catalog/command.js';
import type { DiscoveredCommand } from '../../catalog/types.js';
import type { ExecutionContext } from '../../context.js';
import type { CommandProvider } from '../types.js';
import { fileExists, isDirectory, readHead } from './files.js';

export const SCRIPT_DIRECTORIES = ['bin', 'scripts', '.dev/scripts', 'tools'] as const;

const HEAD_BYTES = 4096;
const HEAD_LINES = 20;
const WINDOWS_EXECUTABLE_EXTENSIONS = ['.exe', '.bat', '.cmd', '.com', '.ps1'];

type Ignore = ReturnType<typeof ignore>;

const SCRIPT_RULES: readonly CategoryRule[] = [
  ['build', ['build', 'compile']],
  ['test', ['test']],
  ['quality', ['lint', 'check', 'format', 'typecheck']],
  ['database', ['migrate', 'seed', 'db']],
  ['deploy', ['deploy', 'release', 'publish']],
  ['dev', ['dev', 'start', 'serve', 'watch']],
  ['other', ['setup', 'install', 'clean']],
];

function loadGitignore(repoRoot: string): Ignore {
  const matcher = ignore();
  const gitignorePath = path.join(repoRoot, '.gitignore');
  if (fileExists(gitignorePath)) {
    matcher.add(fs.readFileSync(gitignorePath, 'utf-8'));
  }
  return matcher;
}

function isExecutable(stat: fs.Stats, fileName: string, platform: NodeJS.Platform): boolean {
  if (platform === 'win32') {
    return WINDOWS_EXECUTABLE_EXTENSIONS.includes(path.extname(fileName).toLowerCase());
  }
  return (stat.mode & 0o111) !== 0;
}

/**
 * Description from the file head: the first line that is either an explicit
 * `# Description:` or a plain comment of a sensible length that is not a path.
 */
export function extractScriptDescription(head: string): string | null {
  for (const line of head.split(/\r?\n/).slice(0, HEAD_LINES)) {
    const trimmed = line.trim();
    const match = /^#\s*Description:\s*(.+)$/i.exec(trimmed);
    if (match?.[1]) return match[1].trim();
    if (!trimmed.startsWith('# ')) continue;
    const text = trimmed.slice(2).trim();
    if (text.length > 10 && text.length < 100 && !text.includes('bin/') && !text.includes('usr/')) {
      return text;
    }
  }
  return null;
}

function discoverDirectory(
  repoRoot: string,
  dir: string,
  gitignore: Ignore,
  platform: NodeJS.Platform
): DiscoveredCommand[] {
  const absoluteDir = path.join(repoRoot, dir);
  if (!isDirectory(absoluteDir)) return [];
  if (gitignore.ignores(`${dir}/`)) return [];

  const commands: DiscoveredCommand[] = [];
  for (const fileName of fs.readdirSync(absoluteDir).sort()) {
    if (fileName.startsWith('.')) continue;
    const relativePath = `${dir}/${fileName}`;
    if (gitignore.ignores(relativePath)) continue;

    const absolutePath = path.join(absoluteDir, fileName);
    const stat = fs.statSync(absolutePath, { throwIfNoEntry: false });
    if (!stat || !stat.isFile() || !isExecutable(stat, fileName, platform)) continue;

    const description = extractScriptDescription(readHead(absolutePath, HEAD_BYTES));
    commands.push(createDiscoveredCommand({
      id: `script.${dir.replace(/\//g, '_')}.${fileName}`,
      label: fileName,
      description: description ?? `Run ${fileName} script`,
      source: relativePath,
      category: categorize(fileName, SCRIPT_RULES),
      scope: GLOBAL_SCOPE,
      execution: { program: `./${relativePath}`, args: [], cwd: '.' },
    }));
  }
  return commands;
}

export function createScriptsProvider(platform: NodeJS.Platform = process.platform): CommandProvider {
  return {
    name: 'scripts',

    isAvailable(context: ExecutionContext): boolean {
      return SCRIPT_DIRECTORIES.some(dir => isDirectory(path.join(context.repoRoot, dir)));
    },

    discover(context: ExecutionContext): DiscoveredCommand[] {
      const gitignore = loadGitignore(context.repoRoot);
      return SCRIPT_DIRECTORIES.flatMap(dir => discoverDirectory(context.repoRoot, dir, gitignore, platform));
    },
  };
}

export const scriptsProvider: CommandProvider = createScriptsProvider();
