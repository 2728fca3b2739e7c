import path from 'path';
import { createDiscoveredCommand, WORKSPACE_SCOPE } from '../../catalog/command.js';
import type { Category, DiscoveredCommand } from '../../catalog/types.js';
import type { ExecutionContext } from '../../context.js';
import type { CommandProvider } from '../types.js';
import { fileExists } from './files.js';

interface CargoCommand {
  id: string;
  label: string;
  description: string;
  category: Category;
  args: readonly string[];
}

const CARGO_COMMANDS: readonly CargoCommand[] = [
  { id: 'cargo.build.all', label: 'Build all packages', description: 'Build all packages in workspace', category: 'build', args: ['build'] },
  { id: 'cargo.build.release.all', label: 'Build all (release)', description: 'Build all packages in release mode', category: 'build', args: ['build', '--release'] },
  { id: 'cargo.test.all', label: 'Test all packages', description: 'Run tests for all packages', category: 'test', args: ['test'] },
  {
    id: 'cargo.clippy.all',
    label: 'Lint all packages',
    description: 'Run clippy on all packages',
    category: 'quality',
    args: ['clippy', '--all-targets', '--all-features', '--', '-D', 'warnings'],
  },
  { id: 'cargo.fmt.all', label: 'Format all packages', description: 'Format all packages with rustfmt', category: 'quality', args: ['fmt', '--all'] },
  {
    id: 'cargo.check.all',
    label: 'Check all packages',
    description: 'Run cargo check on all packages',
    category: 'quality',
    args: ['check', '--all-targets', '--all-features'],
  },
];

export const cargoProvider: CommandProvider = {
  name: 'cargo',

  isAvailable(context: ExecutionContext): boolean {
    return context.hasExecutable('cargo') && fileExists(path.join(context.repoRoot, 'Cargo.toml'));
  },

  discover(): DiscoveredCommand[] {
    return CARGO_COMMANDS.map(c => createDiscoveredCommand({
      id: c.id,
      label: c.label,
      description: c.description,
      source: 'Cargo.toml',
      category: c.category,
      scope: WORKSPACE_SCOPE,
      execution: { program: 'cargo', args: c.args, cwd: '.' },
    }));
  },
};
