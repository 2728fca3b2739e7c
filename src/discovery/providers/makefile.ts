import fs from 'fs';
import path from 'path';
import { categorize, createDiscoveredCommand, GLOBAL_SCOPE, type CategoryRule } from '../../catalog/command.js';
import type { DiscoveredCommand } from '../../catalog/types.js';
import type { ExecutionContext } from '../../context.js';
import type { CommandProvider } from '../types.js';
import { firstExisting } from './files.js';

const MAKEFILE_NAMES = ['Makefile', 'makefile', 'GNUmakefile'] as const;

const TARGET_RULES: readonly CategoryRule[] = [
  ['build', ['build', 'compile']],
  ['test', ['test']],
  ['quality', ['lint', 'check', 'format', 'typecheck']],
  ['deploy', ['deploy', 'release', 'publish']],
  ['dev', ['dev', 'start', 'serve', 'watch']],
  ['other', ['clean', 'install', 'setup']],
];

export interface MakeTarget {
  name: string;
  description: string | null;
}

/**
 * Targets in file order. A target line is unindented, has ':' before any '=',
 * and carries no variable reference. Comment lines directly above a target
 * (no blank line between) become its description; special '.' lines such as
 * .PHONY sit between a comment and its target without breaking the link.
 */
export function parseMakeTargets(content: string): MakeTarget[] {
  const targets: MakeTarget[] = [];
  const seen = new Set<string>();
  let comment: string[] = [];

  for (const line of content.split(/\r?\n/)) {
    const trimmed = line.trim();

    if (trimmed === '') {
      comment = [];
      continue;
    }
    // recipe lines
    if (line.startsWith('\t') || line.startsWith(' ')) continue;

    if (trimmed.startsWith('#')) {
      const text = trimmed.replace(/^#+/, '').trim();
      if (text) comment.push(text);
      continue;
    }

    if (trimmed.startsWith('.')) continue;

    const colon = trimmed.indexOf(':');
    const equals = trimmed.indexOf('=');
    const isRule = colon > 0
      && (equals === -1 || colon < equals)
      && trimmed[colon + 1] !== '='
      && !trimmed.startsWith(':=', colon + 1);
    if (!isRule) {
      comment = [];
      continue;
    }

    const targetPart = trimmed.slice(0, colon);
    const name = targetPart.split(/\s+/)[0];
    if (!name || name.startsWith('_') || targetPart.includes('$(') || targetPart.includes('${')) {
      comment = [];
      continue;
    }

    if (!seen.has(name)) {
      seen.add(name);
      targets.push({ name, description: comment.length > 0 ? comment.join(' ') : null });
    }
    comment = [];
  }

  return targets;
}

export const makefileProvider: CommandProvider = {
  name: 'makefile',

  isAvailable(context: ExecutionContext): boolean {
    return context.hasExecutable('make') && firstExisting(context.repoRoot, MAKEFILE_NAMES) !== null;
  },

  discover(context: ExecutionContext): DiscoveredCommand[] {
    const makefile = firstExisting(context.repoRoot, MAKEFILE_NAMES);
    if (!makefile) return [];
    const content = fs.readFileSync(path.join(context.repoRoot, makefile), 'utf-8');

    return parseMakeTargets(content)
      .sort((a, b) => a.name.localeCompare(b.name))
      .map(target => createDiscoveredCommand({
        id: `make.${target.name}`,
        label: target.name,
        description: target.description ?? `Run make target: ${target.name}`,
        source: makefile,
        category: categorize(target.name, TARGET_RULES),
        scope: GLOBAL_SCOPE,
        execution: { program: 'make', args: [target.name], cwd: '.' },
      }));
  },
};
