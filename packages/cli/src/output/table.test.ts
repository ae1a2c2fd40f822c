import { stripAnsi } from '@repairbench/shared';
import type { RunReport, StratumStats } from '@repairbench/shared';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { printCorpusCounts, printRunSummary, printTable } from './table';

function stats(pass: number, total: number): StratumStats {
  const latency = { count: total, mean: 10, p50: 10, p90: 20, p99: 20 };
  return {
    total,
    outcomes: { Pass: pass, Fail: total - pass, Timeout: 0, PatchRejected: 0, AgentError: 0, SandboxError: 0 },
    passRate: pass / total,
    localizationAccuracy: 0.5,
    localizationAssessed: 2,
    localizationCorrect: 1,
    partialCredit: 0,
    timeouts: { 'agent-deadline': 0, 'resource-limit': 0, cancelled: 0 },
    generationLatencyMs: latency,
    totalDurationMs: latency,
  };
}

describe('table output', () => {
  let output: string[];

  beforeEach(() => {
    output = [];
    vi.spyOn(console, 'log').mockImplementation((line: unknown) => {
      output.push(stripAnsi(String(line)));
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('prints nothing for an empty table', () => {
    printTable([]);
    expect(output).toEqual([]);
  });

  it('renders one row per strategy and the head-to-head table', () => {
    const report: RunReport = {
      schemaVersion: 1,
      runId: 'r1',
      startedAt: '2024-01-01T00:00:00.000Z',
      final: true,
      scheduled: 8,
      recorded: 8,
      strategies: ['react', 'plain'],
      totals: { react: stats(3, 4), plain: stats(1, 4) },
      byCategory: [],
      byDifficulty: [],
      strata: [],
      runs: [],
      comparisons: [
        {
          a: 'react',
          b: 'plain',
          scenarios: 4,
          bothPass: 1,
          bothFail: 1,
          aWins: 2,
          bWins: 0,
          passRateDelta: 0.5,
          localizationAccuracyDelta: 0,
          perScenario: [],
        },
      ],
    };

    printRunSummary(report);

    const [totals, heading, headToHead] = output;
    const reactRow = totals?.split('\n').find((line) => line.includes('react'));
    expect(reactRow).toContain('75.0%');
    expect(reactRow).toContain('50.0%');
    expect(totals?.split('\n').find((line) => line.includes('plain'))).toContain('25.0%');
    expect(heading).toBe('\nHead to head:');
    expect(headToHead).toContain('react vs plain');
    expect(headToHead).toContain('+50.0pp');
  });

  it('sorts corpus counts', () => {
    printCorpusCounts({ byCategory: { 'stale-key': 2, 'missing-import': 1 }, byDifficulty: { easy: 3 } });

    const categories = output[0]?.split('\n') ?? [];
    const missing = categories.findIndex((line) => line.includes('missing-import'));
    const stale = categories.findIndex((line) => line.includes('stale-key'));
    expect(missing).toBeGreaterThan(-1);
    expect(stale).toBeGreaterThan(missing);
    expect(output[1]).toContain('easy');
  });
});
