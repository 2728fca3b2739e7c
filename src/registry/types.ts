export interface SimpleCommandEntry {
  readonly kind: 'simple';
  readonly command: string;
}

export interface FullCommandEntry {
  readonly kind: 'full';
  readonly default: string;
  /** Dependency references as declared: 'pkg:cmd' or bare 'pkg'. */
  readonly deps: readonly string[];
  readonly variants: ReadonlyMap<string, string>;
}

export type CommandEntry = SimpleCommandEntry | FullCommandEntry;

export interface PackageNode {
  readonly path: string;          // absolute package directory
  readonly name: string;
  readonly commands: ReadonlyMap<string, CommandEntry>;
}

export interface CommandTriple {
  readonly packageName: string;
  readonly commandName: string;
  readonly entry: CommandEntry;
}

export interface CommandListing {
  readonly name: string;
  readonly packages: readonly string[];
  readonly variants: readonly string[];
}
