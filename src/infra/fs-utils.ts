import { promises as fs } from 'node:fs';
import { isAbsolute, relative, resolve, sep } from 'node:path';

export function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const { code } = error;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}

export function isEnoent(error: unknown): boolean {
  return errorCode(error) === 'ENOENT';
}

export function isEexist(error: unknown): boolean {
  return errorCode(error) === 'EEXIST';
}

export async function readFileOrNull(filePath: string): Promise<string | null> {
  try {
    return await fs.readFile(filePath, 'utf-8');
  } catch (e) {
    if (isEnoent(e)) return null;
    throw e;
  }
}

export async function pathExists(target: string): Promise<boolean> {
  try {
    await fs.access(target);
    return true;
  } catch (e) {
    if (isEnoent(e)) return false;
    throw e;
  }
}

/**
 * True when `target` resolves strictly inside `root`.
 * The root itself does not count as contained.
 */
export function isContainedIn(root: string, target: string): boolean {
  const rel = relative(resolve(root), resolve(target));
  return rel !== '' && rel !== '..' && !rel.startsWith(`..${sep}`) && !isAbsolute(rel);
}
