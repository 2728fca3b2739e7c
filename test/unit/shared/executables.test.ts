import fs from 'fs';
import path from 'path';
import { createExecutableLookup } from '../../../src/shared/executables.js';
import { makeRepo, removeRepo } from '../../helpers/fixtures.js';

describe('createExecutableLookup', () => {
  let dir: string;

  beforeEach(() => {
    dir = makeRepo({
      'bin/tool': { content: '#!/bin/sh\n', executable: true },
      'bin/readme': 'not a program\n',
    });
  });

  afterEach(() => removeRepo(dir));

  it('finds executables on PATH', () => {
    const has = createExecutableLookup({ PATH: path.join(dir, 'bin') }, 'linux');
    expect(has('tool')).toBe(true);
    expect(has('missing')).toBe(false);
  });

  it('ignores files without an execute bit', () => {
    const has = createExecutableLookup({ PATH: path.join(dir, 'bin') }, 'linux');
    expect(has('readme')).toBe(false);
  });

  it('memoizes answers for the life of the lookup', () => {
    const has = createExecutableLookup({ PATH: path.join(dir, 'bin') }, 'linux');
    expect(has('tool')).toBe(true);
    fs.rmSync(path.join(dir, 'bin', 'tool'));
    expect(has('tool')).toBe(true);
  });

  it('returns false for everything when PATH is empty', () => {
    const has = createExecutableLookup({}, 'linux');
    expect(has('sh')).toBe(false);
  });
});
