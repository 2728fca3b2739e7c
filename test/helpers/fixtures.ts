import fs from 'fs';
import os from 'os';
import path from 'path';

export interface FixtureFile {
  content: string;
  executable?: boolean;
}

/**
 * Create a throwaway repository under the OS temp dir.
 * Keys are paths relative to the root; string values are plain files.
 */
export function makeRepo(files: Record<string, string | FixtureFile> = {}): string {
  const root = fs.mkdtempSync(path.join(os.tmpdir(), 'devtasks-'));
  for (const [relative, spec] of Object.entries(files)) {
    const file: FixtureFile = typeof spec === 'string' ? { content: spec } : spec;
    const target = path.join(root, relative);
    fs.mkdirSync(path.dirname(target), { recursive: true });
    fs.writeFileSync(target, file.content);
    if (file.executable) fs.chmodSync(target, 0o755);
  }
  return root;
}

export function removeRepo(root: string): void {
  fs.rmSync(root, { recursive: true, force: true });
}
