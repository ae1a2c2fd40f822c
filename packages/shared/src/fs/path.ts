import path from 'node:path';
import os from 'node:os';

/**
 * Normalizes a path to use forward slashes, which is the standard inside the harness.
 * Scenario trees and patch edits are always keyed by forward-slash paths.
 */
export function normalizePath(p: string): string {
  return p.replace(/\\/g, '/');
}

/**
 * Checks if the current environment is Windows.
 */
export function isWindows(): boolean {
  return os.platform() === 'win32';
}

/**
 * Canonical form of a path inside a scenario tree: forward slashes, no `./`
 * segments, no trailing slash.
 *
 * @returns `null` when the path is empty, absolute, or climbs out of the tree.
 */
export function toTreePath(p: string): string | null {
  const normalized = normalizePath(p).trim();
  if (normalized === '') return null;
  if (normalized.startsWith('/') || /^[a-zA-Z]:\//.test(normalized)) return null;

  const collapsed = path.posix.normalize(normalized).replace(/\/+$/, '');
  if (collapsed === '.' || collapsed === '..' || collapsed.startsWith('../')) return null;
  return collapsed;
}

/**
 * True when `candidate` resolves to `root` itself or somewhere beneath it.
 */
export function isInside(root: string, candidate: string): boolean {
  const rel = path.relative(path.resolve(root), path.resolve(candidate));
  return rel === '' || (!rel.startsWith('..') && !path.isAbsolute(rel));
}

/**
 * True when a tree path refers to a descriptor location, either exactly or as a
 * path suffix (`fastapi/exception_handlers.py` matches `exception_handlers.py`).
 */
export function matchesLocation(treePath: string, location: string): boolean {
  const a = toTreePath(treePath);
  const b = toTreePath(location);
  if (a === null || b === null) return false;
  return a === b || a.endsWith(`/${b}`);
}
