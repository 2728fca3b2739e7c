import fs from 'fs';
import path from 'path';

export type ExecutableLookup = (name: string) => boolean;

const WINDOWS_DEFAULT_EXTENSIONS = '.COM;.EXE;.BAT;.CMD';

function isExecutableFile(candidate: string, platform: NodeJS.Platform): boolean {
  try {
    const stat = fs.statSync(candidate);
    if (!stat.isFile()) return false;
    if (platform === 'win32') return true;
    fs.accessSync(candidate, fs.constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Build a PATH lookup that only stats files. Answers are memoized for the
 * lifetime of the returned function, so one session never re-scans PATH.
 */
export function createExecutableLookup(
  env: NodeJS.ProcessEnv = process.env,
  platform: NodeJS.Platform = process.platform
): ExecutableLookup {
  const cache = new Map<string, boolean>();
  const dirs = (env['PATH'] ?? env['Path'] ?? '').split(path.delimiter).filter(Boolean);
  const extensions = platform === 'win32'
    ? (env['PATHEXT'] ?? WINDOWS_DEFAULT_EXTENSIONS).split(';').filter(Boolean)
    : [''];

  return (name: string): boolean => {
    const cached = cache.get(name);
    if (cached !== undefined) return cached;
    let found = false;
    for (const dir of dirs) {
      if (extensions.some(ext => isExecutableFile(path.join(dir, name + ext), platform))) {
        found = true;
        break;
      }
    }
    cache.set(name, found);
    return found;
  };
}
