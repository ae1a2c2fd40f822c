import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import { SandboxError, isInside } from '@repairbench/shared';
import type { FileTree, SandboxPhase } from '@repairbench/shared';
import { errnoCode } from '../runner/runner';

export const WORKSPACE_PREFIX = 'repairbench-';

const TRANSIENT_ERRNO = new Set(['EAGAIN', 'EMFILE', 'ENFILE', 'ENOMEM', 'EBUSY']);

export function isTransientErrno(error: unknown): boolean {
  const code = errnoCode(error);
  return code !== undefined && TRANSIENT_ERRNO.has(code);
}

function wrap(error: unknown, phase: SandboxPhase, message: string, transient: boolean): SandboxError {
  const reason = error instanceof Error ? error.message : String(error);
  return new SandboxError(`${message}: ${reason}`, { phase, transient, cause: error });
}

/**
 * Creates a fresh, empty workspace directory. Failures here are always transient.
 */
export async function createWorkspace(tmpRoot: string = os.tmpdir()): Promise<string> {
  try {
    await fs.ensureDir(tmpRoot);
    return await fs.mkdtemp(path.join(tmpRoot, WORKSPACE_PREFIX));
  } catch (error: unknown) {
    throw wrap(error, 'workspace', 'Failed to create workspace', true);
  }
}

/**
 * Writes files into the workspace. Every path must stay under `root`.
 */
export async function writeFiles(
  root: string,
  files: FileTree,
  phase: 'materialize' | 'patch',
): Promise<void> {
  for (const [treePath, content] of Object.entries(files)) {
    const target = path.join(root, treePath);
    if (!isInside(root, target)) {
      throw new SandboxError(`path "${treePath}" is outside the workspace`, { phase });
    }
    try {
      await fs.outputFile(target, content, 'utf8');
    } catch (error: unknown) {
      throw wrap(error, phase, `Failed to write ${treePath}`, isTransientErrno(error));
    }
  }
}

export async function removeWorkspace(dir: string): Promise<void> {
  await fs.remove(dir);
}
