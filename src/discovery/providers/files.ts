import fs from 'fs';
import path from 'path';
import type { z } from 'zod';
import { DevtasksError, DevtasksErrorCode } from '../../shared/errors.js';

export function fileExists(p: string): boolean {
  return fs.existsSync(p);
}

export function isDirectory(p: string): boolean {
  try {
    return fs.statSync(p).isDirectory();
  } catch {
    return false;
  }
}

/** First of `names` present in `dir`, in the order given. */
export function firstExisting(dir: string, names: readonly string[]): string | null {
  for (const name of names) {
    if (fileExists(path.join(dir, name))) return name;
  }
  return null;
}

export function readJsonFile<T extends z.ZodTypeAny>(filePath: string, schema: T): z.infer<T> {
  const raw = fs.readFileSync(filePath, 'utf-8');
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new DevtasksError(
      DevtasksErrorCode.CONFIG_INVALID,
      `Failed to parse ${filePath}: ${err instanceof Error ? err.message : String(err)}`
    );
  }
  const result = schema.safeParse(parsed);
  if (!result.success) {
    throw new DevtasksError(DevtasksErrorCode.CONFIG_INVALID, `Unexpected shape in ${filePath}`, {
      issues: result.error.issues.map(i => `${i.path.join('.') || '<root>'}: ${i.message}`),
    });
  }
  return result.data;
}

/** At most `maxBytes` from the start of a file, decoded as UTF-8. */
export function readHead(filePath: string, maxBytes: number): string {
  const fd = fs.openSync(filePath, 'r');
  try {
    const buffer = Buffer.alloc(maxBytes);
    const bytesRead = fs.readSync(fd, buffer, 0, maxBytes, 0);
    return buffer.subarray(0, bytesRead).toString('utf-8');
  } finally {
    fs.closeSync(fd);
  }
}

export function toPosix(p: string): string {
  return p.split(path.sep).join('/');
}
