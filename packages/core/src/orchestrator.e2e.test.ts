import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import { ScriptedAgentAdapter } from '@repairbench/adapters';
import { SandboxExecutor } from '@repairbench/exec';
import type { LimitsConfig } from '@repairbench/shared';
import { makeScenario } from './__fixtures__/harness';
import { RunOrchestrator } from './orchestrator';

const limits: LimitsConfig = {
  wallClockMs: 10_000,
  cpuSeconds: 10,
  memoryMb: 512,
  maxOutputBytes: 64 * 1024,
  killGraceMs: 200,
};

const importFix = {
  respond: {
    edits: [
      {
        path: 'app/handlers.sh',
        content: '. ./app/encoders.sh # import encode\nhandle() { encode "$1"; }\n',
      },
    ],
  },
};

const handlers = makeScenario('missing-import', {
  files: {
    'run.sh': '. ./app/handlers.sh\nhandle ok\n',
    'app/encoders.sh': 'encode() { echo "encoded:$1"; }\n',
    'app/handlers.sh': 'handle() { encode "$1"; }\n',
  },
  expectedFix: { kind: 'structural', file: 'handlers.sh', requiredSubstring: '# import encode' },
  verificationCommand: 'sh run.sh',
});

describe.runIf(process.platform !== 'win32')('RunOrchestrator with the process sandbox', () => {
  let tmpRoot: string;

  beforeEach(async () => {
    tmpRoot = await fs.mkdtemp(path.join(os.tmpdir(), 'orchestrator-e2e-'));
  });

  afterEach(async () => {
    await fs.remove(tmpRoot);
  });

  function harness(sandboxLimits: LimitsConfig, adapters: ScriptedAgentAdapter[]) {
    return new RunOrchestrator({
      adapters,
      sandbox: new SandboxExecutor({ limits: sandboxLimits, tmpRoot }),
      concurrency: 2,
      deadlineMs: 5_000,
      retry: { count: 0, initialDelayMs: 1, backoffFactor: 2, maxDelayMs: 10 },
    });
  }

  it('passes a structural fix only when the required line is present', async () => {
    const { report } = await harness(limits, [
      new ScriptedAgentAdapter('fixer', () => importFix),
      // Exits 0 through an unrelated change; the structural check still fails it.
      new ScriptedAgentAdapter('shortcut', () => ({
        respond: { edits: [{ path: 'run.sh', content: 'echo ok\n' }] },
      })),
    ]).run([handlers]);

    expect(report.runs.map((r) => [r.strategy, r.outcome, r.localizationCorrect])).toEqual([
      ['fixer', 'Pass', true],
      ['shortcut', 'Fail', false],
    ]);
    expect(report.runs[1]?.notes).toEqual(['required substring missing from app/handlers.sh']);
    expect(await fs.readdir(tmpRoot)).toEqual([]);
  });

  it('kills a verification command that spins forever', async () => {
    const spin = makeScenario('spin', { verificationCommand: 'while :; do :; done' });
    const started = Date.now();

    const { report } = await harness({ ...limits, wallClockMs: 500, killGraceMs: 100 }, [
      new ScriptedAgentAdapter('a', () => ({ respond: { edits: [{ path: 'main.py', content: 'fixed' }] } })),
    ]).run([spin]);

    expect(report.runs[0]).toMatchObject({
      outcome: 'Timeout',
      timeoutKind: 'resource-limit',
      notes: ['wall-clock limit exceeded'],
    });
    expect(Date.now() - started).toBeLessThan(500 + 100 + 3_000);
    expect(await fs.readdir(tmpRoot)).toEqual([]);
  });
});
