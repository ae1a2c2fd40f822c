import { Command } from 'commander';
import fs from 'fs-extra';
import path from 'path';
import { ConfigLoader, RunOrchestrator } from '@repairbench/core';
import { ScenarioStore } from '@repairbench/corpus';
import { createAgentAdapters } from '@repairbench/adapters';
import { SandboxExecutor } from '@repairbench/exec';
import { ProgressRenderer, writeReport } from '@repairbench/eval';
import { ConsoleLogger, JsonlLogger, UsageError } from '@repairbench/shared';
import type { HarnessConfig, Logger } from '@repairbench/shared';
import {
  parseList,
  parseNonNegativeInt,
  parsePositiveInt,
  parsePositiveNumber,
  toConfigFlags,
} from '../flags';
import type { GlobalOptions, RunFlags } from '../flags';
import { OutputRenderer } from '../output/renderer';
import { printRunSummary } from '../output/table';
import type { CliState } from '../state';

/** Exit code for a run interrupted by SIGINT/SIGTERM */
export const EXIT_CANCELLED = 130;

async function createLogger(config: HarnessConfig): Promise<Logger> {
  if (!config.events) {
    return new ConsoleLogger({ verbose: config.verbose, events: false });
  }
  await fs.ensureDir(path.dirname(config.events));
  await fs.writeFile(config.events, '');
  return new JsonlLogger(config.events, {}, { verbose: config.verbose });
}

function selectStrategies(config: HarnessConfig): string[] {
  const names = config.run.length > 0 ? config.run : Object.keys(config.strategies);
  if (names.length === 0) {
    throw new UsageError(
      'No strategy selected. Pass --strategy <name> or configure strategies in .repairbench.yaml.',
    );
  }
  return [...new Set(names)];
}

export function registerRunCommand(program: Command, state: CliState) {
  program
    .command('run')
    .description('Run every selected strategy against the corpus and write a report')
    .option('--corpus <path>', 'Directory of scenario manifests')
    .option('--strategy <names>', 'Strategies to run (comma-separated)', parseList)
    .option('--concurrency <n>', 'Worker slots', parsePositiveInt)
    .option('--timeout <seconds>', 'Agent deadline per scenario', parsePositiveNumber)
    .option('--retry <n>', 'Retries for transient sandbox failures', parseNonNegativeInt)
    .option('--report <path>', 'Where to write the JSON report')
    .option('--exec-timeout <seconds>', 'Wall-clock limit for the verification command', parsePositiveNumber)
    .option('--cpu-seconds <n>', 'CPU-time limit for the verification command', parsePositiveInt)
    .option('--memory-mb <n>', 'Memory limit for the verification command', parsePositiveInt)
    .option('--max-output-kb <n>', 'Per-stream output capture cap', parsePositiveInt)
    .option('--category <name>', 'Only run scenarios in this category')
    .option('--difficulty <tier>', 'Only run scenarios of this difficulty')
    .option('--events <path>', 'Append structured events to this JSONL file')
    .action(async (options: RunFlags) => {
      const globalOpts = program.opts<GlobalOptions>();
      const output = new OutputRenderer(!!globalOpts.json);

      const config = ConfigLoader.load({
        configPath: globalOpts.config,
        flags: toConfigFlags(options, globalOpts, process.cwd()),
      });
      if (!config.corpus) {
        throw new UsageError('No corpus given. Pass --corpus <path> or set corpus in the config file.');
      }

      const store = await ScenarioStore.load(config.corpus);
      const strategies = selectStrategies(config);
      const adapters = createAgentAdapters(strategies, config.strategies);
      const scenarios = [...store.filter(config.filter)];
      if (scenarios.length === 0) {
        output.warn('No scenarios match the selected filters.');
      }

      const logger = await createLogger(config);
      const progress = output.json ? undefined : new ProgressRenderer();
      const orchestrator = new RunOrchestrator({
        adapters,
        sandbox: new SandboxExecutor({ limits: config.limits, logger }),
        concurrency: config.concurrency,
        deadlineMs: Math.round(config.timeoutSec * 1000),
        retry: config.retry,
        logger,
        onVerdict: (verdict, timings, scheduled) =>
          progress?.logVerdict(verdict, scheduled, timings.totalDurationMs),
      });

      const controller = new AbortController();
      const cancel = () => {
        output.warn('\nCancelling: in-flight scenario-runs are being stopped...');
        controller.abort();
      };
      process.once('SIGINT', cancel);
      process.once('SIGTERM', cancel);

      progress?.logRunStarted(orchestrator.runId, scenarios.length * adapters.length, strategies);
      try {
        const { report, cancelled } = await orchestrator.run(scenarios, {
          signal: controller.signal,
          corpusPath: config.corpus,
        });
        const reportPath = await writeReport(config.report, report);
        if (logger instanceof JsonlLogger) {
          await logger.flush();
        }

        if (output.json) {
          output.data({
            runId: report.runId,
            reportPath,
            cancelled,
            scheduled: report.scheduled,
            recorded: report.recorded,
            totals: report.totals,
          });
        } else {
          progress?.logRunFinished(report, reportPath, cancelled);
          printRunSummary(report);
        }
        if (cancelled) {
          state.exitCode = EXIT_CANCELLED;
        }
      } finally {
        process.removeListener('SIGINT', cancel);
        process.removeListener('SIGTERM', cancel);
      }
    });
}
