import path from 'node:path';

/**
 * Normalizes a path to forward slashes so checklist keys and patch targets
 * compare equal across platforms.
 */
export function normalizePath(p: string): string {
  return p.replace(/\\/g, '/');
}

export function join(...paths: string[]): string {
  return normalizePath(path.join(...paths));
}

export function relative(from: string, to: string): string {
  return normalizePath(path.relative(from, to));
}

export function dirname(p: string): string {
  return normalizePath(path.dirname(p));
}

export function resolve(...pathSegments: string[]): string {
  return normalizePath(path.resolve(...pathSegments));
}

/**
 * True when `target` resolves to `root` itself or somewhere beneath it.
 */
export function isWithin(root: string, target: string): boolean {
  const rel = path.relative(path.resolve(root), path.resolve(root, target));
  return rel !== '..' && !rel.startsWith(`..${path.sep}`) && !path.isAbsolute(rel);
}
