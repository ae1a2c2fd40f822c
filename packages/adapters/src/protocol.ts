import { z } from 'zod';
import type { FileEdit } from '@repairbench/shared';

const WriteEditSchema = z.object({
  path: z.string().min(1),
  content: z.string(),
});

const DiffEditSchema = z.object({
  path: z.string().min(1),
  diff: z.string(),
});

export const EditSchema = z.union([WriteEditSchema, DiffEditSchema]);

/**
 * What an agent answers with: edits to apply, a refusal, or an error it detected
 * itself.
 */
export const AgentResponseSchema = z.union([
  z.object({ edits: z.array(EditSchema) }),
  z.object({ refusal: z.string() }),
  z.object({ error: z.string() }),
]);

export type AgentResponse = z.infer<typeof AgentResponseSchema>;

export function toFileEdits(edits: z.infer<typeof EditSchema>[]): FileEdit[] {
  return edits.map((edit): FileEdit =>
    'content' in edit
      ? { kind: 'write', path: edit.path, content: edit.content }
      : { kind: 'diff', path: edit.path, diff: edit.diff },
  );
}

/**
 * Validates a decoded agent response.
 *
 * @returns the response, or a message describing why it does not match the protocol
 */
export function parseAgentResponse(
  raw: unknown,
): { success: true; data: AgentResponse } | { success: false; message: string } {
  const result = AgentResponseSchema.safeParse(raw);
  if (result.success) return { success: true, data: result.data };
  const issue = result.error.issues[0];
  const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
  return { success: false, message: `invalid agent response${where}: ${issue?.message ?? 'unknown'}` };
}

/**
 * Decodes agent stdout. Agents may log before answering, so when the whole output
 * is not JSON the last non-empty line is tried.
 */
export function decodeAgentOutput(stdout: string): unknown {
  const trimmed = stdout.trim();
  if (trimmed === '') {
    throw new SyntaxError('agent produced no output');
  }
  try {
    return JSON.parse(trimmed);
  } catch (error: unknown) {
    const lines = trimmed.split(/\r?\n/).filter((l) => l.trim() !== '');
    const last = lines[lines.length - 1];
    if (last === undefined || lines.length === 1) throw error;
    return JSON.parse(last);
  }
}
