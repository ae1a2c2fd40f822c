import type { PatchCandidate } from './patch';
import type { SandboxPhase } from '../errors';

export type LimitKind = 'wall-clock' | 'cpu' | 'memory';

export interface ExecutionResult {
  scenarioId: string;
  strategy: string;
  /** null when the process was terminated by a signal */
  exitCode: number | null;
  signal: string | null;
  stdout: string;
  stderr: string;
  stdoutTruncated: boolean;
  stderrTruncated: boolean;
  durationMs: number;
  resourceExceeded: boolean;
  breachedLimit?: LimitKind;
}

/**
 * What the agent adapter produced for a scenario-run.
 */
export type AgentOutcome =
  | { kind: 'patch'; patch: PatchCandidate }
  | { kind: 'refusal'; reason: string; latencyMs: number }
  /** `cancelled` is set when the run was aborted rather than hitting its deadline */
  | { kind: 'timeout'; latencyMs: number; cancelled?: boolean }
  | { kind: 'error'; message: string; latencyMs: number };

/**
 * What the sandbox produced once a patch was available.
 */
export type ExecutionOutcome =
  | { kind: 'result'; result: ExecutionResult }
  | { kind: 'sandbox-error'; message: string; phase: SandboxPhase }
  | { kind: 'cancelled'; message: string };

export const VERDICT_OUTCOMES = [
  'Pass',
  'Fail',
  'Timeout',
  'PatchRejected',
  'AgentError',
  'SandboxError',
] as const;

export type VerdictOutcome = (typeof VERDICT_OUTCOMES)[number];

export type TimeoutKind = 'agent-deadline' | 'resource-limit' | 'cancelled';

export interface VerdictWarning {
  code: 'VerificationError';
  message: string;
}

/**
 * Terminal classification of one (scenario, strategy) run.
 * Carries no timing so that identical inputs always yield identical verdicts.
 */
export interface Verdict {
  scenarioId: string;
  strategy: string;
  category: string;
  difficulty: string;
  outcome: VerdictOutcome;
  timeoutKind?: TimeoutKind;
  /** The patch touched a location named by the expected-fix descriptor */
  localizationCorrect: boolean;
  /** False when there was no patch or the descriptor names no location */
  localizationAssessed: boolean;
  notes: string[];
  warnings: VerdictWarning[];
}

export interface RunTimings {
  /** Agent generation latency */
  generationLatencyMs?: number;
  /** Verification command wall-clock time of the final attempt */
  executionDurationMs?: number;
  /** End-to-end time for the scenario-run */
  totalDurationMs: number;
  /** Sandbox attempts made (0 when execution was never reached) */
  attempts: number;
}
