/**
 * Replace (or create) a file with the given content.
 */
export interface WriteFileEdit {
  kind: 'write';
  /** Relative path inside the workspace */
  path: string;
  content: string;
}

/**
 * Apply a unified diff to a single file. A missing file is treated as empty.
 */
export interface DiffFileEdit {
  kind: 'diff';
  path: string;
  diff: string;
}

export type FileEdit = WriteFileEdit | DiffFileEdit;

/**
 * A non-empty patch returned by a repair agent for one scenario.
 */
export interface PatchCandidate {
  scenarioId: string;
  strategy: string;
  /** Applied in order */
  edits: FileEdit[];
  /** Time the agent took to produce the patch */
  latencyMs: number;
}
