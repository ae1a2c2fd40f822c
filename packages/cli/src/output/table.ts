import Table from 'cli-table3';
import pc from 'picocolors';
import type { RunReport } from '@repairbench/shared';

export function printTable(
  data: Record<string, unknown>[],
  options?: Table.TableConstructorOptions,
) {
  const first = data[0];
  if (!first) return;
  const head = options?.head ?? Object.keys(first);
  const table = new Table({ ...options, head });
  data.forEach((row) => table.push(Object.values(row).map((v) => String(v))));
  console.log(table.toString());
}

const pct = (value: number) => `${(value * 100).toFixed(1)}%`;

function colorRate(value: number): string {
  const text = pct(value);
  return value > 0.8 ? pc.green(text) : value > 0.5 ? pc.yellow(text) : pc.red(text);
}

/**
 * Per-strategy totals followed by the head-to-head comparison, if any.
 */
export function printRunSummary(report: RunReport) {
  printTable(
    report.strategies.flatMap((strategy) => {
      const stats = report.totals[strategy];
      if (!stats) return [];
      return [
        {
          strategy: pc.bold(strategy),
          runs: stats.total,
          pass: stats.outcomes.Pass,
          fail: stats.outcomes.Fail,
          timeout: stats.outcomes.Timeout,
          rejected: stats.outcomes.PatchRejected,
          agentErr: stats.outcomes.AgentError,
          sandboxErr: stats.outcomes.SandboxError,
          passRate: colorRate(stats.passRate),
          localization: pct(stats.localizationAccuracy),
          partial: stats.partialCredit,
          genP50: `${stats.generationLatencyMs.p50}ms`,
          totalP90: `${stats.totalDurationMs.p90}ms`,
        },
      ];
    }),
    {
      head: [
        'Strategy',
        'Runs',
        'Pass',
        'Fail',
        'Timeout',
        'Rejected',
        'Agent err',
        'Sandbox err',
        'Pass rate',
        'Localization',
        'Partial',
        'Gen p50',
        'Total p90',
      ],
    },
  );

  if (report.comparisons.length === 0) return;
  console.log(pc.bold('\nHead to head:'));
  printTable(
    report.comparisons.map((c) => ({
      pair: `${c.a} vs ${c.b}`,
      scenarios: c.scenarios,
      bothPass: c.bothPass,
      aWins: c.aWins,
      bWins: c.bWins,
      bothFail: c.bothFail,
      delta: `${c.passRateDelta >= 0 ? '+' : ''}${(c.passRateDelta * 100).toFixed(1)}pp`,
    })),
    { head: ['Pair', 'Scenarios', 'Both pass', 'A wins', 'B wins', 'Both fail', 'Pass rate Δ'] },
  );
}

/**
 * Scenario counts by category and by difficulty.
 */
export function printCorpusCounts(counts: {
  byCategory: Record<string, number>;
  byDifficulty: Record<string, number>;
}) {
  const rows = (record: Record<string, number>) =>
    Object.entries(record)
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([key, count]) => ({ key, count }));

  printTable(rows(counts.byCategory), { head: ['Category', 'Scenarios'] });
  printTable(rows(counts.byDifficulty), { head: ['Difficulty', 'Scenarios'] });
}
