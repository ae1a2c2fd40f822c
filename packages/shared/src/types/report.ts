import type { TimeoutKind, VerdictOutcome } from './results';

export const REPORT_SCHEMA_VERSION = 1;

export interface LatencySummary {
  count: number;
  mean: number;
  p50: number;
  p90: number;
  p99: number;
}

/**
 * Statistics for one slice of the run (a stratum or a rollup of strata).
 */
export interface StratumStats {
  total: number;
  outcomes: Record<VerdictOutcome, number>;
  /** Pass / total. Only Pass counts toward the headline rate. */
  passRate: number;
  /** Correctly localized / verdicts where localization could be assessed */
  localizationAccuracy: number;
  localizationAssessed: number;
  localizationCorrect: number;
  /** Right location but no Pass */
  partialCredit: number;
  timeouts: Record<TimeoutKind, number>;
  generationLatencyMs: LatencySummary;
  totalDurationMs: LatencySummary;
}

export interface StratumKey {
  strategy: string;
  category: string;
  difficulty: string;
}

export interface StratumEntry extends StratumKey {
  stats: StratumStats;
}

export interface ScenarioRunRow {
  scenarioId: string;
  strategy: string;
  category: string;
  difficulty: string;
  outcome: VerdictOutcome;
  timeoutKind?: TimeoutKind;
  localizationCorrect: boolean;
  notes: string[];
  warnings: string[];
  attempts: number;
  generationLatencyMs?: number;
  totalDurationMs: number;
}

export type HeadToHeadResult = 'both-pass' | 'both-fail' | 'a-wins' | 'b-wins';

export interface StrategyComparison {
  a: string;
  b: string;
  /** Scenarios both strategies were run against */
  scenarios: number;
  bothPass: number;
  bothFail: number;
  aWins: number;
  bWins: number;
  /** passRate(a) - passRate(b) over the shared scenarios */
  passRateDelta: number;
  localizationAccuracyDelta: number;
  perScenario: Array<{ scenarioId: string; result: HeadToHeadResult }>;
}

export interface RunReport {
  schemaVersion: typeof REPORT_SCHEMA_VERSION;
  runId: string;
  startedAt: string;
  finishedAt?: string;
  final: boolean;
  scheduled: number;
  recorded: number;
  strategies: string[];
  totals: Record<string, StratumStats>;
  byCategory: Array<{ strategy: string; category: string; stats: StratumStats }>;
  byDifficulty: Array<{ strategy: string; difficulty: string; stats: StratumStats }>;
  strata: StratumEntry[];
  runs: ScenarioRunRow[];
  comparisons: StrategyComparison[];
}
