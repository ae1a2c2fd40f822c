import { z } from 'zod';
import { CorpusError, toTreePath } from '@repairbench/shared';
import type { ExpectedFix } from '@repairbench/shared';

/** Fields every manifest must name, in the order they are reported. */
export const REQUIRED_FIELDS = [
  'id',
  'source',
  'category',
  'difficulty',
  'symptom',
  'expected_fix',
  'verification_command',
] as const;

const Scalar = z.union([z.string().min(1), z.number()]).transform(String);

export const StructuralFixSchema = z.object({
  file: z.string().min(1),
  required_substring: z.string().min(1),
});

export const BehavioralFixSchema = z.object({
  verification_command: z.string().min(1),
  expected_output: z.string().optional(),
  locations: z.array(z.string().min(1)).optional(),
});

export const ManifestSchema = z.object({
  id: Scalar,
  source: z.string().min(1),
  category: z.string().min(1),
  difficulty: Scalar,
  files: z.record(z.string(), z.string()).optional(),
  /** Directory holding the scenario's files, relative to the manifest */
  tree: z.string().min(1).optional(),
  symptom: z.string(),
  expected_fix: z.union([StructuralFixSchema, BehavioralFixSchema]),
  verification_command: z.string().min(1),
});

export type RawManifest = z.infer<typeof ManifestSchema>;

export interface ParsedManifest {
  id: string;
  source: string;
  category: string;
  difficulty: string;
  symptom: string;
  expectedFix: ExpectedFix;
  verificationCommand: string;
  /** Inline files keyed by canonical tree path */
  files: Record<string, string>;
  tree?: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validates one manifest document. `fallbackId` names the scenario in errors when
 * the manifest has no usable `id`.
 */
export function parseManifest(raw: unknown, fallbackId: string): ParsedManifest {
  if (!isRecord(raw)) {
    throw new CorpusError(`scenario ${fallbackId}: manifest is not an object`, {
      scenarioId: fallbackId,
    });
  }

  const rawId = raw.id;
  const id =
    typeof rawId === 'string' && rawId.trim() !== ''
      ? rawId
      : typeof rawId === 'number'
        ? String(rawId)
        : fallbackId;

  for (const field of REQUIRED_FIELDS) {
    if (raw[field] === undefined || raw[field] === null) {
      throw CorpusError.missingField(id, field);
    }
  }
  if (raw.files === undefined && raw.tree === undefined) {
    throw CorpusError.missingField(id, 'files');
  }

  const result = ManifestSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue ? issue.path.join('.') : 'manifest';
    throw new CorpusError(
      `scenario ${id}: invalid field '${field}': ${issue ? issue.message : 'invalid manifest'}`,
      { scenarioId: id, field, details: { issues: result.error.issues } },
    );
  }
  const manifest = result.data;

  const files: Record<string, string> = {};
  for (const [rawPath, content] of Object.entries(manifest.files ?? {})) {
    const treePath = toTreePath(rawPath);
    if (treePath === null) {
      throw new CorpusError(`scenario ${id}: invalid file path '${rawPath}'`, {
        scenarioId: id,
        field: 'files',
      });
    }
    files[treePath] = content;
  }

  return {
    id: manifest.id,
    source: manifest.source,
    category: manifest.category,
    difficulty: manifest.difficulty,
    symptom: manifest.symptom,
    expectedFix: toExpectedFix(manifest.expected_fix),
    verificationCommand: manifest.verification_command,
    files,
    tree: manifest.tree,
  };
}

function toExpectedFix(fix: RawManifest['expected_fix']): ExpectedFix {
  if ('file' in fix) {
    return { kind: 'structural', file: fix.file, requiredSubstring: fix.required_substring };
  }
  return {
    kind: 'behavioral',
    verificationCommand: fix.verification_command,
    ...(fix.expected_output !== undefined ? { expectedOutput: fix.expected_output } : {}),
    ...(fix.locations !== undefined ? { locations: fix.locations } : {}),
  };
}
