import { applyPatch } from 'diff';
import isBinaryPath from 'is-binary-path';
import type { FileTree } from '../types/scenario';
import type { FileEdit } from '../types/patch';
import { toTreePath } from '../fs/path';

export type EditFailureKind = 'INVALID_PATH' | 'BINARY_TARGET' | 'UNREADABLE_CONTENT' | 'HUNK_FAILED';

export interface EditFailure {
  index: number;
  path: string;
  kind: EditFailureKind;
  message: string;
}

export type ApplyEditsResult =
  | { ok: true; tree: Record<string, string>; touched: string[] }
  | { ok: false; failure: EditFailure };

/**
 * Computes the content a single edit produces, given the file's current content
 * (`undefined` when the file does not exist yet).
 */
export function applyEdit(
  current: string | undefined,
  edit: FileEdit,
): { ok: true; content: string } | { ok: false; kind: EditFailureKind; message: string } {
  if (edit.kind === 'write') {
    if (edit.content.includes('\u0000')) {
      return { ok: false, kind: 'UNREADABLE_CONTENT', message: 'content contains NUL bytes' };
    }
    return { ok: true, content: edit.content };
  }

  let patched: string | false;
  try {
    patched = applyPatch(current ?? '', edit.diff);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    return { ok: false, kind: 'HUNK_FAILED', message: `malformed diff: ${message}` };
  }
  if (patched === false) {
    return { ok: false, kind: 'HUNK_FAILED', message: 'diff does not apply to current content' };
  }
  if (patched.includes('\u0000')) {
    return { ok: false, kind: 'UNREADABLE_CONTENT', message: 'patched content contains NUL bytes' };
  }
  return { ok: true, content: patched };
}

/**
 * Canonical tree path for an edit target, or a failure for paths the sandbox
 * must never write (absolute, escaping, binary).
 */
export function validateEditPath(
  rawPath: string,
): { ok: true; path: string } | { ok: false; kind: EditFailureKind; message: string } {
  const treePath = toTreePath(rawPath);
  if (treePath === null) {
    return {
      ok: false,
      kind: 'INVALID_PATH',
      message: `path "${rawPath}" is outside the workspace`,
    };
  }
  if (isBinaryPath(treePath)) {
    return { ok: false, kind: 'BINARY_TARGET', message: `path "${rawPath}" is a binary file` };
  }
  return { ok: true, path: treePath };
}

/**
 * Applies edits in order to an in-memory copy of a tree. The input is not modified.
 * Stops at the first edit that fails.
 */
export function applyEditsToTree(tree: FileTree, edits: readonly FileEdit[]): ApplyEditsResult {
  const next: Record<string, string> = { ...tree };
  const touched: string[] = [];

  for (const [index, edit] of edits.entries()) {
    const target = validateEditPath(edit.path);
    if (!target.ok) {
      return { ok: false, failure: { index, path: edit.path, kind: target.kind, message: target.message } };
    }

    const result = applyEdit(next[target.path], edit);
    if (!result.ok) {
      return {
        ok: false,
        failure: { index, path: edit.path, kind: result.kind, message: `${target.path}: ${result.message}` },
      };
    }

    next[target.path] = result.content;
    if (!touched.includes(target.path)) touched.push(target.path);
  }

  return { ok: true, tree: next, touched };
}
