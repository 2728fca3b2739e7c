import { DevtasksError, DevtasksErrorCode } from '../shared/errors.js';
import { variantNames } from './entry.js';
import type { CommandEntry, CommandListing, CommandTriple, PackageNode } from './types.js';

/**
 * Read-only table of declared package commands.
 * Package order is the order the config loader supplied; nothing is reloaded after construction.
 */
export class CommandRegistry {
  private readonly byName: ReadonlyMap<string, PackageNode>;

  constructor(packages: readonly PackageNode[]) {
    const byName = new Map<string, PackageNode>();
    for (const pkg of packages) {
      const existing = byName.get(pkg.name);
      if (existing) {
        throw new DevtasksError(
          DevtasksErrorCode.CONFIG_INVALID,
          `Duplicate package name '${pkg.name}' (${existing.path} and ${pkg.path})`
        );
      }
      byName.set(pkg.name, pkg);
    }
    this.byName = byName;
  }

  packages(): PackageNode[] {
    return Array.from(this.byName.values());
  }

  getPackage(name: string): PackageNode | undefined {
    return this.byName.get(name);
  }

  requirePackage(name: string): PackageNode {
    const pkg = this.byName.get(name);
    if (!pkg) {
      const available = Array.from(this.byName.keys());
      throw new DevtasksError(
        DevtasksErrorCode.PACKAGE_NOT_FOUND,
        `Package '${name}' not found. Available packages: ${available.length > 0 ? available.join(', ') : 'none'}`
      );
    }
    return pkg;
  }

  get(packageName: string, commandName: string): CommandEntry | undefined {
    return this.byName.get(packageName)?.commands.get(commandName);
  }

  has(packageName: string, commandName: string): boolean {
    return this.get(packageName, commandName) !== undefined;
  }

  requireCommand(packageName: string, commandName: string): CommandEntry {
    const pkg = this.requirePackage(packageName);
    const entry = pkg.commands.get(commandName);
    if (!entry) {
      const available = Array.from(pkg.commands.keys());
      throw new DevtasksError(
        DevtasksErrorCode.COMMAND_NOT_FOUND,
        `Command '${commandName}' not found in package '${packageName}'. Available commands: ${available.length > 0 ? available.join(', ') : 'none'}`
      );
    }
    return entry;
  }

  packagesWithCommand(commandName: string): PackageNode[] {
    return this.packages().filter(pkg => pkg.commands.has(commandName));
  }

  entries(): CommandTriple[] {
    const triples: CommandTriple[] = [];
    for (const pkg of this.byName.values()) {
      for (const [commandName, entry] of pkg.commands) {
        triples.push({ packageName: pkg.name, commandName, entry });
      }
    }
    return triples;
  }

  /** Every declared command name with the packages defining it and the union of their variants. */
  listCommands(): CommandListing[] {
    const grouped = new Map<string, { packages: string[]; variants: Set<string> }>();
    for (const { packageName, commandName, entry } of this.entries()) {
      const group = grouped.get(commandName) ?? { packages: [], variants: new Set<string>() };
      group.packages.push(packageName);
      for (const variant of variantNames(entry)) group.variants.add(variant);
      grouped.set(commandName, group);
    }
    return Array.from(grouped.entries())
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([name, group]) => ({
        name,
        packages: [...group.packages].sort(),
        variants: Array.from(group.variants).sort(),
      }));
  }
}
