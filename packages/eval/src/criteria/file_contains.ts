import { matchesLocation, toTreePath } from '@repairbench/shared';
import type { FileTree } from '@repairbench/shared';
import type { CriterionEvaluator } from './types';

interface FileContainsDetails {
  file: string;
  substring: string;
}

export type FileLookup =
  | { kind: 'found'; path: string }
  | { kind: 'missing' }
  | { kind: 'ambiguous'; candidates: string[] };

/**
 * Finds a descriptor file in a tree: exact path first, then a unique path suffix.
 */
export function lookupFile(tree: FileTree, file: string): FileLookup {
  const exact = toTreePath(file);
  if (exact !== null && Object.prototype.hasOwnProperty.call(tree, exact)) {
    return { kind: 'found', path: exact };
  }
  const candidates = Object.keys(tree)
    .filter((p) => matchesLocation(p, file))
    .sort();
  if (candidates.length === 1 && candidates[0] !== undefined) {
    return { kind: 'found', path: candidates[0] };
  }
  return candidates.length === 0 ? { kind: 'missing' } : { kind: 'ambiguous', candidates };
}

export const file_contains: CriterionEvaluator<FileContainsDetails> = ({ patchedTree }, details) => {
  const found = lookupFile(patchedTree, details.file);

  if (found.kind === 'missing') {
    return {
      passed: false,
      message: `expected-fix file '${details.file}' not found`,
      warning: `expected-fix file '${details.file}' is not present in the patched tree`,
    };
  }
  if (found.kind === 'ambiguous') {
    return {
      passed: false,
      message: `expected-fix file '${details.file}' is ambiguous`,
      warning: `expected-fix file '${details.file}' matches ${found.candidates.join(', ')}`,
    };
  }

  const content = patchedTree[found.path] ?? '';
  return content.includes(details.substring)
    ? { passed: true, message: `${found.path} contains required substring` }
    : { passed: false, message: `required substring missing from ${found.path}` };
};
