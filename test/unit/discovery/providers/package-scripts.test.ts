import path from 'path';
import { createContext } from '../../../../src/context.js';
import {
  detectPackageManager,
  idSafePackageName,
  packageScriptsProvider,
} from '../../../../src/discovery/providers/package-scripts.js';
import { createPackageNode } from '../../../../src/registry/entry.js';
import { makeRepo, removeRepo } from '../../../helpers/fixtures.js';

describe('idSafePackageName', () => {
  it('drops the @ and replaces the scope slash', () => {
    expect(idSafePackageName('@acme/web')).toBe('acme-web');
    expect(idSafePackageName('api')).toBe('api');
  });
});

describe('detectPackageManager', () => {
  it('picks the manager from lock and workspace files', () => {
    const pnpm = makeRepo({ 'pnpm-workspace.yaml': 'packages: []\n' });
    const yarn = makeRepo({ 'yarn.lock': '' });
    const npm = makeRepo({ 'package.json': '{}' });
    try {
      expect(detectPackageManager(pnpm)).toBe('pnpm');
      expect(detectPackageManager(yarn)).toBe('yarn');
      expect(detectPackageManager(npm)).toBe('npm');
    } finally {
      [pnpm, yarn, npm].forEach(removeRepo);
    }
  });
});

describe('packageScriptsProvider', () => {
  let root: string;

  beforeEach(() => {
    root = makeRepo({
      'package.json': JSON.stringify({ name: 'monorepo', workspaces: ['packages/*'], scripts: { test: 'jest', build: 'tsc -b' } }),
      'packages/web/package.json': JSON.stringify({ name: '@acme/web', scripts: { dev: 'vite' } }),
      'yarn.lock': '',
    });
  });

  afterEach(() => removeRepo(root));

  it('requires node on PATH', () => {
    const context = createContext({ repoRoot: root, env: {}, hasExecutable: name => name !== 'node' });
    expect(packageScriptsProvider.isAvailable(context)).toBe(false);
  });

  it('lists root scripts with workspace scope and package scripts with package scope', () => {
    const context = createContext({
      repoRoot: root,
      env: {},
      hasExecutable: () => true,
      packages: [createPackageNode({ path: path.join(root, 'packages', 'web'), name: 'web' })],
    });

    const commands = packageScriptsProvider.discover(context);

    expect(commands.map(c => c.id)).toEqual(['npm.monorepo.build', 'npm.monorepo.test', 'npm.acme-web.dev']);
    expect(commands[0]).toMatchObject({
      label: 'build (all)',
      description: 'Run build script in all packages',
      source: 'package.json',
      category: 'build',
      scope: { kind: 'workspace' },
      execution: { program: 'yarn', args: ['run', 'build'], cwd: '.' },
    });
    expect(commands[2]).toMatchObject({
      label: 'dev (web)',
      source: 'packages/web/package.json',
      category: 'dev',
      scope: { kind: 'package', name: 'web' },
      execution: { program: 'yarn', args: ['run', 'dev'], cwd: 'packages/web' },
    });
  });

  it('uses global scope for a single-package repository', () => {
    const single = makeRepo({ 'package.json': JSON.stringify({ name: 'tool', scripts: { lint: 'eslint .' } }) });
    try {
      const commands = packageScriptsProvider.discover(createContext({ repoRoot: single, env: {}, hasExecutable: () => true }));
      expect(commands).toHaveLength(1);
      expect(commands[0]).toMatchObject({
        id: 'npm.tool.lint',
        label: 'lint',
        category: 'quality',
        scope: { kind: 'global' },
        execution: { program: 'npm', args: ['run', 'lint'], cwd: '.' },
      });
    } finally {
      removeRepo(single);
    }
  });

  it('throws on a malformed manifest', () => {
    const broken = makeRepo({ 'package.json': '{ not json' });
    try {
      const context = createContext({ repoRoot: broken, env: {}, hasExecutable: () => true });
      expect(() => packageScriptsProvider.discover(context)).toThrow(/Failed to parse/);
    } finally {
      removeRepo(broken);
    }
  });
});
