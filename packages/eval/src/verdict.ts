import { applyEditsToTree, expectedLocations, matchesLocation, toTreePath } from '@repairbench/shared';
import type {
  AgentOutcome,
  ExecutionOutcome,
  ExecutionResult,
  PatchCandidate,
  Scenario,
  Verdict,
  VerdictOutcome,
  VerdictWarning,
} from '@repairbench/shared';
import { expected_output, file_contains, script_exit } from './criteria';
import type { CriterionInput } from './criteria';

export interface Localization {
  assessed: boolean;
  correct: boolean;
}

/**
 * Whether a patch touched a location named by the scenario's descriptor.
 * Independent of whether the patch fixed anything.
 */
export function assessLocalization(scenario: Scenario, patch: PatchCandidate | undefined): Localization {
  const locations = expectedLocations(scenario.expectedFix);
  if (!patch || locations.length === 0) {
    return { assessed: false, correct: false };
  }
  const touched = patch.edits
    .map((edit) => toTreePath(edit.path))
    .filter((p): p is string => p !== null);
  const correct = touched.some((p) => locations.some((loc) => matchesLocation(p, loc)));
  return { assessed: true, correct };
}

function descriptorWarnings(scenario: Scenario): VerdictWarning[] {
  const fix = scenario.expectedFix;
  if (fix.kind === 'behavioral' && fix.verificationCommand.trim() !== scenario.verificationCommand.trim()) {
    return [
      {
        code: 'VerificationError',
        message: `expected_fix.verification_command "${fix.verificationCommand}" differs from the scenario's; "${scenario.verificationCommand}" was run`,
      },
    ];
  }
  return [];
}

/**
 * Classifies one scenario-run into its terminal verdict.
 *
 * Pure: the same scenario, agent outcome and execution outcome always produce an
 * equal verdict. Pass requires an execution result that satisfies the descriptor.
 */
export function classify(
  scenario: Scenario,
  strategy: string,
  agent: AgentOutcome,
  execution?: ExecutionOutcome,
): Verdict {
  const patch = agent.kind === 'patch' && agent.patch.edits.length > 0 ? agent.patch : undefined;
  const localization = assessLocalization(scenario, patch);
  const warnings = descriptorWarnings(scenario);

  const verdict = (
    outcome: VerdictOutcome,
    notes: string[],
    extra: Pick<Verdict, 'timeoutKind'> = {},
    extraWarnings: VerdictWarning[] = [],
  ): Verdict => ({
    scenarioId: scenario.id,
    strategy,
    category: scenario.category,
    difficulty: scenario.difficulty,
    outcome,
    ...extra,
    localizationCorrect: localization.correct,
    localizationAssessed: localization.assessed,
    notes,
    warnings: [...warnings, ...extraWarnings],
  });

  // Agent-side outcomes never reach execution.
  switch (agent.kind) {
    case 'refusal':
      return verdict('PatchRejected', [`agent refused: ${agent.reason}`]);
    case 'error':
      return verdict('AgentError', [`agent error: ${agent.message}`]);
    case 'timeout':
      return agent.cancelled
        ? verdict('Timeout', ['run cancelled before the agent answered'], { timeoutKind: 'cancelled' })
        : verdict('Timeout', ['agent deadline exceeded'], { timeoutKind: 'agent-deadline' });
  }
  if (!patch) {
    return verdict('PatchRejected', ['agent returned an empty patch']);
  }

  // Patch received but no result was ever produced.
  if (!execution || execution.kind === 'cancelled') {
    return verdict('Timeout', [execution?.message ?? 'run cancelled before execution finished'], {
      timeoutKind: 'cancelled',
    });
  }

  if (execution.kind === 'sandbox-error') {
    return verdict('SandboxError', [`sandbox ${execution.phase} error: ${execution.message}`]);
  }

  const result = execution.result;

  if (result.resourceExceeded) {
    return verdict('Timeout', [`${result.breachedLimit ?? 'resource'} limit exceeded`], {
      timeoutKind: 'resource-limit',
    });
  }

  return classifyResult(scenario, patch, result, verdict);
}

type VerdictBuilder = (
  outcome: VerdictOutcome,
  notes: string[],
  extra?: Pick<Verdict, 'timeoutKind'>,
  extraWarnings?: VerdictWarning[],
) => Verdict;

/**
 * Criterion input for a finished execution, with the patch re-applied to the
 * scenario tree. Null when the edits no longer apply.
 */
export function criterionInput(
  scenario: Scenario,
  patch: PatchCandidate,
  result: ExecutionResult,
): CriterionInput | null {
  const patched = applyEditsToTree(scenario.files, patch.edits);
  return patched.ok ? { scenario, patchedTree: patched.tree, result } : null;
}

function classifyResult(
  scenario: Scenario,
  patch: PatchCandidate,
  result: ExecutionResult,
  verdict: VerdictBuilder,
): Verdict {
  const fix = scenario.expectedFix;
  const notes: string[] = [];
  const extraWarnings: VerdictWarning[] = [];

  const input = criterionInput(scenario, patch, result);
  if (!input) {
    return verdict('Fail', ['patch could not be re-applied to the scenario tree'], {}, [
      { code: 'VerificationError', message: 'criteria could not be evaluated' },
    ]);
  }

  // Structural check on post-patch content, independent of the exit code.
  if (fix.kind === 'structural') {
    const check = file_contains(input, { file: fix.file, substring: fix.requiredSubstring });
    if (check.warning) extraWarnings.push({ code: 'VerificationError', message: check.warning });
    if (!check.passed) {
      return verdict('Fail', [check.message], {}, extraWarnings);
    }
    notes.push(check.message);
  }

  const exit = script_exit(input, { expectedExitCode: 0 });
  if (!exit.passed) {
    return verdict('Fail', [...notes, exit.message], {}, extraWarnings);
  }
  if (fix.kind === 'behavioral' && fix.expectedOutput !== undefined) {
    const output = expected_output(input, { expected: fix.expectedOutput });
    if (!output.passed) {
      return verdict('Fail', [...notes, `exit 0 but ${output.message}`], {}, extraWarnings);
    }
    notes.push(output.message);
  }
  return verdict('Pass', [...notes, exit.message], {}, extraWarnings);
}
