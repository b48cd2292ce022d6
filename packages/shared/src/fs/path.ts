import path from 'node:path';

/**
 * Normalizes a path to use forward slashes.
 * Archive entry names and commit file lists are always posix-style, whatever the host OS.
 *
 * @param p The path to normalize.
 * @returns The normalized path with forward slashes.
 */
export function normalizePath(p: string): string {
  return p.replace(/\\/g, '/');
}

/**
 * A platform-agnostic version of `path.relative`.
 *
 * @param from The path to calculate the relative path from.
 * @param to The path to calculate the relative path to.
 * @returns The relative path.
 */
export function relative(from: string, to: string): string {
  return normalizePath(path.relative(from, to));
}

/**
 * Returns true when `child` is `parent` itself or lies below it.
 */
export function isWithin(parent: string, child: string): boolean {
  const rel = path.relative(path.resolve(parent), path.resolve(child));
  return rel === '' || (!rel.startsWith('..') && !path.isAbsolute(rel));
}
