export const CATEGORIES = [
  'build',
  'test',
  'quality',
  'services',
  'database',
  'dev',
  'deploy',
  'git',
  'dependencies',
  'scripts',
  'other',
] as const;

export type Category = typeof CATEGORIES[number];

export type CommandScope =
  | { readonly kind: 'workspace' }
  | { readonly kind: 'package'; readonly name: string }
  | { readonly kind: 'global' };

/**
 * Data-only description of how to run a discovered command.
 * `cwd` is relative to the repository root so the catalog stays valid if the checkout moves.
 */
export interface ExecutionDescriptor {
  readonly program: string;
  readonly args: readonly string[];
  readonly cwd: string;
}

export interface DiscoveredCommand {
  readonly id: string;            // e.g. 'npm.web.build', 'make.test'
  readonly label: string;
  readonly description: string;
  readonly source: string;        // file the command came from, relative to repo root
  readonly category: Category;
  readonly scope: CommandScope;
  readonly execution: ExecutionDescriptor;
}
