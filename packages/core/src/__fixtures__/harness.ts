import type { ExecutionResult, HarnessEvent, Logger, PatchCandidate, Scenario } from '@repairbench/shared';
import type { Sandbox } from '../orchestrator';

export function makeScenario(id: string, overrides: Partial<Scenario> = {}): Scenario {
  return {
    id,
    source: 'fixtures',
    category: id.startsWith('imp') ? 'missing-import' : 'stale-key',
    difficulty: 'easy',
    files: { 'main.py': 'print(undefined_name)\n' },
    symptom: "NameError: name 'undefined_name' is not defined",
    expectedFix: { kind: 'behavioral', verificationCommand: 'python main.py', locations: ['main.py'] },
    verificationCommand: 'python main.py',
    manifestPath: `/fixtures/${id}.json`,
    ...overrides,
  };
}

export function resultFor(patch: PatchCandidate, exitCode: number): ExecutionResult {
  return {
    scenarioId: patch.scenarioId,
    strategy: patch.strategy,
    exitCode,
    signal: null,
    stdout: '',
    stderr: '',
    stdoutTruncated: false,
    stderrTruncated: false,
    durationMs: 1,
    resourceExceeded: false,
  };
}

/**
 * In-process sandbox: exits 0 when any edit writes content containing "fixed".
 */
export class FakeSandbox implements Sandbox {
  readonly calls: Array<{ scenarioId: string; strategy: string }> = [];

  constructor(
    private readonly behaviour: (
      patch: PatchCandidate,
      call: number,
    ) => Promise<ExecutionResult> | ExecutionResult = defaultBehaviour,
  ) {}

  async run(
    _scenario: Scenario,
    patch: PatchCandidate,
    options: { onSpawn?: (pid: number | undefined, command: string) => void },
  ): Promise<ExecutionResult> {
    this.calls.push({ scenarioId: patch.scenarioId, strategy: patch.strategy });
    options.onSpawn?.(4242, 'python main.py');
    return this.behaviour(patch, this.calls.length);
  }
}

function defaultBehaviour(patch: PatchCandidate): ExecutionResult {
  const fixed = patch.edits.some((e) => e.kind === 'write' && e.content.includes('fixed'));
  return resultFor(patch, fixed ? 0 : 1);
}

/**
 * Logger that keeps events in memory.
 */
export class MemoryLogger implements Logger {
  readonly events: HarnessEvent[] = [];
  readonly messages: string[] = [];

  log(event: HarnessEvent): void {
    this.events.push(event);
  }

  debug(message: string): void {
    this.messages.push(message);
  }

  info(message: string): void {
    this.messages.push(message);
  }

  warn(message: string): void {
    this.messages.push(message);
  }

  error(error: Error, message?: string): void {
    this.messages.push(message ?? error.message);
  }

  child(): Logger {
    return this;
  }
}
