import { createContext } from '../../../../src/context.js';
import { composeProvider, parseComposeServices } from '../../../../src/discovery/providers/compose.js';
import { DevtasksErrorCode } from '../../../../src/shared/errors.js';
import { makeRepo, removeRepo } from '../../../helpers/fixtures.js';

const COMPOSE = `services:
  web:
    image: nginx
    ports: ["8080:80"]
  db:
    image: postgres
`;

describe('parseComposeServices', () => {
  it('returns service names sorted', () => {
    expect(parseComposeServices(COMPOSE)).toEqual(['db', 'web']);
  });

  it('treats an empty file or missing services as none', () => {
    expect(parseComposeServices('')).toEqual([]);
    expect(parseComposeServices('version: "3.8"\n')).toEqual([]);
  });

  it('rejects invalid YAML', () => {
    expect(() => parseComposeServices('services: [unclosed', 'compose.yml')).toThrow(
      expect.objectContaining({ code: DevtasksErrorCode.CONFIG_INVALID })
    );
  });
});

describe('composeProvider', () => {
  let root: string;

  beforeEach(() => {
    root = makeRepo({ 'compose.yaml': COMPOSE });
  });

  afterEach(() => removeRepo(root));

  it('needs docker or docker-compose on PATH', () => {
    expect(composeProvider.isAvailable(createContext({ repoRoot: root, env: {}, hasExecutable: () => false }))).toBe(false);
    expect(composeProvider.isAvailable(createContext({ repoRoot: root, env: {}, hasExecutable: n => n === 'docker-compose' }))).toBe(true);
  });

  it('emits global actions then per-service commands through docker compose', () => {
    const commands = composeProvider.discover(createContext({ repoRoot: root, env: {}, hasExecutable: () => true }));

    expect(commands.map(c => c.id)).toEqual([
      'docker.up',
      'docker.down',
      'docker.logs',
      'docker.restart',
      'docker.build',
      'docker.ps',
      'docker.up.db',
      'docker.logs.db',
      'docker.up.web',
      'docker.logs.web',
    ]);
    expect(commands[0].execution).toEqual({ program: 'docker', args: ['compose', 'up', '-d'], cwd: '.' });
    expect(commands[2].execution.args).toEqual(['compose', 'logs', '-f', '--tail', '200']);
    expect(commands[4].category).toBe('build');
    expect(commands[8].execution.args).toEqual(['compose', 'up', '-d', 'web']);
    expect(commands.every(c => c.source === 'compose.yaml')).toBe(true);
  });

  it('falls back to the standalone docker-compose binary', () => {
    const context = createContext({ repoRoot: root, env: {}, hasExecutable: n => n === 'docker-compose' });
    const [up] = composeProvider.discover(context);
    expect(up.execution).toEqual({ program: 'docker-compose', args: ['up', '-d'], cwd: '.' });
  });
});
