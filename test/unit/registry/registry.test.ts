import { CommandRegistry } from '../../../src/registry/registry.js';
import { DevtasksErrorCode } from '../../../src/shared/errors.js';
import { pkg } from '../../helpers/packages.js';

describe('CommandRegistry', () => {
  const registry = new CommandRegistry([
    pkg('web', { build: 'vite build', test: { default: 'vitest run', variants: { watch: 'vitest' } } }),
    pkg('api', { build: { default: 'cargo build', deps: ['web'], variants: { release: 'cargo build --release' } } }),
  ]);

  it('keeps packages in the order supplied', () => {
    expect(registry.packages().map(p => p.name)).toEqual(['web', 'api']);
  });

  it('answers lookups by package and command', () => {
    expect(registry.has('web', 'build')).toBe(true);
    expect(registry.has('api', 'test')).toBe(false);
    expect(registry.get('missing', 'build')).toBeUndefined();
    expect(registry.getPackage('api')?.path).toBe('/repo/api');
  });

  it('finds every package defining a command', () => {
    expect(registry.packagesWithCommand('build').map(p => p.name)).toEqual(['web', 'api']);
    expect(registry.packagesWithCommand('deploy')).toEqual([]);
  });

  it('lists every package/command triple', () => {
    expect(registry.entries().map(t => `${t.packageName}:${t.commandName}`)).toEqual(['web:build', 'web:test', 'api:build']);
  });

  it('lists commands sorted with their packages and variants', () => {
    expect(registry.listCommands()).toEqual([
      { name: 'build', packages: ['api', 'web'], variants: ['release'] },
      { name: 'test', packages: ['web'], variants: ['watch'] },
    ]);
  });

  it('throws PACKAGE_NOT_FOUND and COMMAND_NOT_FOUND with the available names', () => {
    expect(() => registry.requirePackage('docs')).toThrow("Package 'docs' not found. Available packages: web, api");
    expect(() => registry.requireCommand('api', 'test')).toThrow(
      expect.objectContaining({ code: DevtasksErrorCode.COMMAND_NOT_FOUND })
    );
  });

  it('rejects duplicate package names', () => {
    expect(() => new CommandRegistry([pkg('web', {}), pkg('web', {})])).toThrow(
      expect.objectContaining({ code: DevtasksErrorCode.CONFIG_INVALID })
    );
  });
});
