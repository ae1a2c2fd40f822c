import { stripAnsi } from '@repairbench/shared';
import type { Verdict } from '@repairbench/shared';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { Aggregator } from './aggregator';
import { ProgressRenderer, outcomeBadge } from './renderer';

describe('ProgressRenderer', () => {
  let lines: string[];

  beforeEach(() => {
    lines = [];
    vi.spyOn(console, 'log').mockImplementation((line: unknown) => {
      lines.push(stripAnsi(String(line)));
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  const verdict: Verdict = {
    scenarioId: 'fastapi-missing-import',
    strategy: 'react',
    category: 'missing-import',
    difficulty: 'easy',
    outcome: 'Timeout',
    timeoutKind: 'resource-limit',
    localizationCorrect: false,
    localizationAssessed: false,
    notes: [],
    warnings: [{ code: 'VerificationError', message: 'descriptor drift' }],
  };

  it('numbers verdict lines and prints warnings', () => {
    const renderer = new ProgressRenderer();
    renderer.logVerdict(verdict, 2, 1500);
    renderer.logVerdict({ ...verdict, outcome: 'Pass', timeoutKind: undefined, warnings: [] }, 2, 20);

    expect(lines).toEqual([
      '(1/2) fastapi-missing-import [react] TIMEOUT (resource-limit) in 1500ms',
      '    warning: descriptor drift',
      '(2/2) fastapi-missing-import [react] PASS in 20ms',
    ]);
  });

  it('summarizes each strategy at the end', () => {
    const aggregator = new Aggregator({
      runId: 'r1',
      scheduled: [{ scenarioId: 'fastapi-missing-import', strategy: 'react' }],
    });
    aggregator.record({ ...verdict, outcome: 'Pass', timeoutKind: undefined }, { totalDurationMs: 3, attempts: 1 });
    new ProgressRenderer().logRunFinished(aggregator.finalize(), '/tmp/report.json');

    expect(lines).toContain('react: 100.0% pass (1/1), localization 0.0%');
    expect(lines).toContain('\nFull report available at: /tmp/report.json');
  });

  it('upper-cases outcome badges', () => {
    expect(stripAnsi(outcomeBadge('PatchRejected'))).toBe('PATCHREJECTED');
  });
});
