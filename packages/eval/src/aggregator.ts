import { AppError, REPORT_SCHEMA_VERSION } from '@repairbench/shared';
import type {
  HeadToHeadResult,
  RunReport,
  RunTimings,
  ScenarioRunRow,
  StrategyComparison,
  StratumEntry,
  StratumStats,
  TimeoutKind,
  Verdict,
  VerdictOutcome,
} from '@repairbench/shared';
import { rate, summarizeLatencies } from './stats';

export interface ScheduledRun {
  scenarioId: string;
  strategy: string;
}

export interface RecordedRun {
  verdict: Verdict;
  timings: RunTimings;
}

export interface AggregatorOptions {
  runId: string;
  /** Every (scenario, strategy) pair the run will produce a verdict for */
  scheduled: readonly ScheduledRun[];
  startedAt?: Date;
}

const runKey = (scenarioId: string, strategy: string) => `${strategy}\u0000${scenarioId}`;

/**
 * Accumulates verdicts into per-(strategy, category, difficulty) statistics.
 *
 * The only shared mutable state of a run. `record` is synchronous, so concurrent
 * workers cannot interleave inside an update.
 */
export class Aggregator {
  private readonly runId: string;
  private readonly startedAt: string;
  private readonly scheduled: ScheduledRun[];
  private readonly scheduledKeys: Set<string>;
  private readonly strategies: string[];
  private readonly recorded = new Map<string, RecordedRun>();
  private finalized = false;

  constructor(options: AggregatorOptions) {
    this.runId = options.runId;
    this.startedAt = (options.startedAt ?? new Date()).toISOString();
    this.scheduled = [...options.scheduled];
    this.scheduledKeys = new Set();
    for (const run of this.scheduled) {
      const key = runKey(run.scenarioId, run.strategy);
      if (this.scheduledKeys.has(key)) {
        throw new AppError(
          'UnknownError',
          `Run ${run.scenarioId}/${run.strategy} is scheduled more than once`,
        );
      }
      this.scheduledKeys.add(key);
    }
    this.strategies = [...new Set(this.scheduled.map((r) => r.strategy))];
  }

  get recordedCount(): number {
    return this.recorded.size;
  }

  get scheduledCount(): number {
    return this.scheduled.length;
  }

  /**
   * Records the terminal verdict of one scheduled run.
   *
   * @throws AppError if the run is not scheduled, was already recorded, or the
   * report has been finalized
   */
  record(verdict: Verdict, timings: RunTimings): void {
    if (this.finalized) {
      throw new AppError('UnknownError', 'Cannot record a verdict after finalize()');
    }
    const key = runKey(verdict.scenarioId, verdict.strategy);
    if (!this.scheduledKeys.has(key)) {
      throw new AppError(
        'UnknownError',
        `Verdict for unscheduled run ${verdict.scenarioId}/${verdict.strategy}`,
      );
    }
    if (this.recorded.has(key)) {
      throw new AppError(
        'UnknownError',
        `Verdict for ${verdict.scenarioId}/${verdict.strategy} was already recorded`,
      );
    }
    this.recorded.set(key, {
      verdict: { ...verdict, notes: [...verdict.notes], warnings: [...verdict.warnings] },
      timings: { ...timings },
    });
  }

  /**
   * Point-in-time report over whatever has been recorded so far. The returned
   * object shares nothing with the aggregator.
   */
  snapshot(): RunReport {
    return this.buildReport(false);
  }

  /**
   * Final report. Requires every scheduled run to have been recorded; may only be
   * called once.
   */
  finalize(finishedAt: Date = new Date()): RunReport {
    if (this.finalized) {
      throw new AppError('UnknownError', 'finalize() was already called');
    }
    if (this.recorded.size !== this.scheduled.length) {
      throw new AppError(
        'UnknownError',
        `Cannot finalize: ${this.recorded.size} of ${this.scheduled.length} scheduled runs recorded`,
      );
    }
    this.finalized = true;
    return this.buildReport(true, finishedAt.toISOString());
  }

  private buildReport(final: boolean, finishedAt?: string): RunReport {
    const runs = this.orderedRuns();

    const totals: Record<string, StratumStats> = {};
    for (const strategy of this.strategies) {
      totals[strategy] = computeStats(runs.filter((r) => r.verdict.strategy === strategy));
    }

    return {
      schemaVersion: REPORT_SCHEMA_VERSION,
      runId: this.runId,
      startedAt: this.startedAt,
      ...(finishedAt ? { finishedAt } : {}),
      final,
      scheduled: this.scheduled.length,
      recorded: runs.length,
      strategies: [...this.strategies],
      totals,
      byCategory: groupBy(runs, (v) => ({ strategy: v.strategy, category: v.category })).map(
        ([key, group]) => ({ ...key, stats: computeStats(group) }),
      ),
      byDifficulty: groupBy(runs, (v) => ({ strategy: v.strategy, difficulty: v.difficulty })).map(
        ([key, group]) => ({ ...key, stats: computeStats(group) }),
      ),
      strata: groupBy(runs, (v) => ({
        strategy: v.strategy,
        category: v.category,
        difficulty: v.difficulty,
      })).map(([key, group]): StratumEntry => ({ ...key, stats: computeStats(group) })),
      runs: runs.map(toRow),
      comparisons: this.compareStrategies(runs),
    };
  }

  /** Recorded runs in scheduling order */
  private orderedRuns(): RecordedRun[] {
    const out: RecordedRun[] = [];
    for (const run of this.scheduled) {
      const recorded = this.recorded.get(runKey(run.scenarioId, run.strategy));
      if (recorded) out.push(recorded);
    }
    return out;
  }

  private compareStrategies(runs: RecordedRun[]): StrategyComparison[] {
    const byStrategy = new Map<string, Map<string, Verdict>>();
    for (const { verdict } of runs) {
      const verdicts = byStrategy.get(verdict.strategy) ?? new Map<string, Verdict>();
      verdicts.set(verdict.scenarioId, verdict);
      byStrategy.set(verdict.strategy, verdicts);
    }

    const comparisons: StrategyComparison[] = [];
    for (let i = 0; i < this.strategies.length; i++) {
      for (let j = i + 1; j < this.strategies.length; j++) {
        const a = this.strategies[i];
        const b = this.strategies[j];
        const comparison = comparePair(a, b, byStrategy.get(a), byStrategy.get(b));
        if (comparison) comparisons.push(comparison);
      }
    }
    return comparisons;
  }
}

function comparePair(
  a: string,
  b: string,
  aVerdicts: Map<string, Verdict> | undefined,
  bVerdicts: Map<string, Verdict> | undefined,
): StrategyComparison | undefined {
  if (!aVerdicts || !bVerdicts) return undefined;

  const perScenario: StrategyComparison['perScenario'] = [];
  const counts: Record<HeadToHeadResult, number> = {
    'both-pass': 0,
    'both-fail': 0,
    'a-wins': 0,
    'b-wins': 0,
  };
  const sharedA: Verdict[] = [];
  const sharedB: Verdict[] = [];

  for (const [scenarioId, va] of aVerdicts) {
    const vb = bVerdicts.get(scenarioId);
    if (!vb) continue;
    sharedA.push(va);
    sharedB.push(vb);

    const aPass = va.outcome === 'Pass';
    const bPass = vb.outcome === 'Pass';
    const result: HeadToHeadResult =
      aPass && bPass ? 'both-pass' : aPass ? 'a-wins' : bPass ? 'b-wins' : 'both-fail';
    counts[result]++;
    perScenario.push({ scenarioId, result });
  }

  if (perScenario.length === 0) return undefined;

  const passRate = (vs: Verdict[]) => rate(vs.filter((v) => v.outcome === 'Pass').length, vs.length);
  const locAccuracy = (vs: Verdict[]) => {
    const assessed = vs.filter((v) => v.localizationAssessed);
    return rate(assessed.filter((v) => v.localizationCorrect).length, assessed.length);
  };

  return {
    a,
    b,
    scenarios: perScenario.length,
    bothPass: counts['both-pass'],
    bothFail: counts['both-fail'],
    aWins: counts['a-wins'],
    bWins: counts['b-wins'],
    passRateDelta: passRate(sharedA) - passRate(sharedB),
    localizationAccuracyDelta: locAccuracy(sharedA) - locAccuracy(sharedB),
    perScenario,
  };
}

function emptyOutcomes(): Record<VerdictOutcome, number> {
  return { Pass: 0, Fail: 0, Timeout: 0, PatchRejected: 0, AgentError: 0, SandboxError: 0 };
}

export function computeStats(runs: readonly RecordedRun[]): StratumStats {
  const outcomes = emptyOutcomes();
  const timeouts: Record<TimeoutKind, number> = {
    'agent-deadline': 0,
    'resource-limit': 0,
    cancelled: 0,
  };
  let localizationAssessed = 0;
  let localizationCorrect = 0;
  let partialCredit = 0;
  const generation: number[] = [];
  const total: number[] = [];

  for (const { verdict, timings } of runs) {
    outcomes[verdict.outcome]++;
    if (verdict.timeoutKind) timeouts[verdict.timeoutKind]++;
    if (verdict.localizationAssessed) {
      localizationAssessed++;
      if (verdict.localizationCorrect) {
        localizationCorrect++;
        if (verdict.outcome !== 'Pass') partialCredit++;
      }
    }
    if (timings.generationLatencyMs !== undefined) generation.push(timings.generationLatencyMs);
    total.push(timings.totalDurationMs);
  }

  return {
    total: runs.length,
    outcomes,
    passRate: rate(outcomes.Pass, runs.length),
    localizationAccuracy: rate(localizationCorrect, localizationAssessed),
    localizationAssessed,
    localizationCorrect,
    partialCredit,
    timeouts,
    generationLatencyMs: summarizeLatencies(generation),
    totalDurationMs: summarizeLatencies(total),
  };
}

/**
 * Groups runs by a composite key, keeping first-seen order of keys.
 */
function groupBy<K extends Record<string, string>>(
  runs: readonly RecordedRun[],
  keyOf: (verdict: Verdict) => K,
): Array<[K, RecordedRun[]]> {
  const groups = new Map<string, [K, RecordedRun[]]>();
  for (const run of runs) {
    const key = keyOf(run.verdict);
    const id = Object.values(key).join('\u0000');
    const group = groups.get(id);
    if (group) {
      group[1].push(run);
    } else {
      groups.set(id, [key, [run]]);
    }
  }
  return [...groups.values()];
}

function toRow({ verdict, timings }: RecordedRun): ScenarioRunRow {
  return {
    scenarioId: verdict.scenarioId,
    strategy: verdict.strategy,
    category: verdict.category,
    difficulty: verdict.difficulty,
    outcome: verdict.outcome,
    ...(verdict.timeoutKind ? { timeoutKind: verdict.timeoutKind } : {}),
    localizationCorrect: verdict.localizationCorrect,
    notes: [...verdict.notes],
    warnings: verdict.warnings.map((w) => w.message),
    attempts: timings.attempts,
    ...(timings.generationLatencyMs !== undefined
      ? { generationLatencyMs: timings.generationLatencyMs }
      : {}),
    totalDurationMs: timings.totalDurationMs,
  };
}
