import type { RunReport, Verdict, VerdictOutcome } from '@repairbench/shared';
import chalk from 'chalk';

const BADGES: Record<VerdictOutcome, (text: string) => string> = {
  Pass: chalk.green.bold,
  Fail: chalk.red.bold,
  Timeout: chalk.yellow.bold,
  PatchRejected: chalk.magenta.bold,
  AgentError: chalk.red.bold,
  SandboxError: chalk.gray.bold,
};

export function outcomeBadge(outcome: VerdictOutcome): string {
  return BADGES[outcome](outcome.toUpperCase());
}

/**
 * Human-readable progress lines for a run, written as verdicts come in.
 */
export class ProgressRenderer {
  private done = 0;

  logRunStarted(runId: string, scheduled: number, strategies: string[]) {
    console.log(chalk.bold.cyan(`\nRun ${runId}: ${scheduled} scenario-runs across ${strategies.join(', ')}`));
    console.log('='.repeat(80));
  }

  logVerdict(verdict: Verdict, total: number, durationMs: number) {
    this.done++;
    const kind = verdict.timeoutKind ? chalk.gray(` (${verdict.timeoutKind})`) : '';
    console.log(
      chalk.gray(`(${this.done}/${total})`) +
        ` ${chalk.bold(verdict.scenarioId)} [${verdict.strategy}] ${outcomeBadge(verdict.outcome)}${kind} in ${durationMs}ms`,
    );
    for (const warning of verdict.warnings) {
      console.log(chalk.yellow(`    warning: ${warning.message}`));
    }
  }

  logRunFinished(report: RunReport, reportPath: string, cancelled = false) {
    console.log('='.repeat(80));
    if (cancelled) {
      console.log(chalk.yellow(`Run cancelled after ${report.recorded}/${report.scheduled} scenario-runs`));
    }
    for (const strategy of report.strategies) {
      const stats = report.totals[strategy];
      if (!stats) continue;
      const pct = stats.passRate * 100;
      const rateColor = pct > 80 ? chalk.green : pct > 50 ? chalk.yellow : chalk.red;
      console.log(
        `${chalk.bold(strategy)}: ${rateColor(`${pct.toFixed(1)}%`)} pass ` +
          `(${stats.outcomes.Pass}/${stats.total}), localization ${(stats.localizationAccuracy * 100).toFixed(1)}%`,
      );
    }
    console.log(chalk.cyan(`\nFull report available at: ${reportPath}`));
  }
}
