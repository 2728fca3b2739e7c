import { extractVariableNames, resolveTemplate } from '../../../src/tasks/template.js';
import { MissingVariablesError } from '../../../src/shared/errors.js';

describe('extractVariableNames', () => {
  it('lists placeholders once, in order of appearance', () => {
    expect(extractVariableNames('deploy {app} to {env} as {app}')).toEqual(['app', 'env']);
  });

  it('ignores shell expansions', () => {
    expect(extractVariableNames('echo ${HOME} {target}')).toEqual(['target']);
  });

  it('accepts dots and dashes inside names', () => {
    expect(extractVariableNames('{db.host}:{db-port}')).toEqual(['db.host', 'db-port']);
  });

  it('treats any braced text as a placeholder', () => {
    expect(extractVariableNames('deploy {my app} to ${env} {1}')).toEqual(['my app', '1']);
  });

  it('ignores empty braces', () => {
    expect(extractVariableNames('find . -exec rm {} +')).toEqual([]);
  });
});

describe('resolveTemplate', () => {
  it('substitutes variables before environment values', () => {
    const resolved = resolveTemplate('deploy {app} to {env}', { env: 'staging' }, { app: 'api', env: 'production' });
    expect(resolved).toBe('deploy api to staging');
  });

  it('leaves shell expansions for the shell', () => {
    expect(resolveTemplate('echo ${HOME}/{dir}', { dir: 'out' }, {})).toBe('echo ${HOME}/out');
  });

  it('names only the missing placeholder', () => {
    let thrown: unknown;
    try {
      resolveTemplate('deploy {app} to {env}', { app: 'api' }, {});
    } catch (err) {
      thrown = err;
    }
    expect(thrown).toBeInstanceOf(MissingVariablesError);
    expect(thrown).toMatchObject({ names: ['env'] });
  });

  it('fails on a braced name that is not an identifier instead of passing it to the shell', () => {
    let thrown: unknown;
    try {
      resolveTemplate('deploy ${env} {region name}', { env: 'prod' }, {});
    } catch (err) {
      thrown = err;
    }
    expect(thrown).toBeInstanceOf(MissingVariablesError);
    expect(thrown).toMatchObject({ names: ['region name'] });
  });

  it('substitutes a braced name containing spaces', () => {
    expect(resolveTemplate('deploy {region name}', { 'region name': 'eu-west' }, {})).toBe('deploy eu-west');
  });

  it('names every missing placeholder once', () => {
    expect(() => resolveTemplate('{a} {b} {a}', {}, {})).toThrow('Missing template variables: a, b.');
  });

  it('does not rescan substituted values', () => {
    expect(resolveTemplate('echo {greeting}', { greeting: '{name}' }, {})).toBe('echo {name}');
  });

  it('treats an undefined variable as absent and falls through to the environment', () => {
    expect(resolveTemplate('run {mode}', { mode: undefined }, { mode: 'fast' })).toBe('run fast');
  });

  it('returns a template without placeholders unchanged', () => {
    expect(resolveTemplate('make build', {}, {})).toBe('make build');
  });
});
