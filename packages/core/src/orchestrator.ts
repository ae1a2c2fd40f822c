import { randomUUID } from 'crypto';
import {
  AgentError,
  SandboxError,
  eventBase,
  logger as defaultLogger,
} from '@repairbench/shared';
import type {
  AgentOutcome,
  ExecutionOutcome,
  ExecutionResult,
  HarnessEvent,
  Logger,
  PatchCandidate,
  RetryConfig,
  RunReport,
  RunTimings,
  Scenario,
  Verdict,
} from '@repairbench/shared';
import type { AgentAdapter } from '@repairbench/adapters';
import { Aggregator, classify } from '@repairbench/eval';
import type { ScheduledRun } from '@repairbench/eval';
import { ScenarioRun } from './run/state';
import { backoffDelay, sleep } from './run/retry';

/**
 * The slice of the sandbox the orchestrator depends on. SandboxExecutor
 * satisfies it; tests substitute in-process fakes.
 */
export interface Sandbox {
  run(
    scenario: Scenario,
    patch: PatchCandidate,
    options: {
      signal?: AbortSignal;
      onSpawn?: (pid: number | undefined, command: string) => void;
    },
  ): Promise<ExecutionResult>;
}

export interface RunOrchestratorOptions {
  adapters: readonly AgentAdapter[];
  sandbox: Sandbox;
  /** Worker slots */
  concurrency: number;
  /** Agent deadline per submission */
  deadlineMs: number;
  retry: RetryConfig;
  runId?: string;
  logger?: Logger;
  /** Called after each verdict is recorded */
  onVerdict?: (verdict: Verdict, timings: RunTimings, scheduled: number) => void;
}

export interface RunOptions {
  signal?: AbortSignal;
  /** Reported in the RunStarted event */
  corpusPath?: string;
}

export interface RunOutcome {
  report: RunReport;
  cancelled: boolean;
}

interface Job extends ScheduledRun {
  scenario: Scenario;
  adapter: AgentAdapter;
}

interface ExecutionAttempts {
  outcome: ExecutionOutcome;
  attempts: number;
}

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Drives every (scenario, strategy) pair through agent, sandbox and verdict with
 * a bounded pool of workers.
 *
 * Each scheduled run ends in exactly one terminal state and one recorded verdict.
 * Failures of the agent or the sandbox become verdicts; only bugs in the harness
 * itself reject `run()`.
 */
export class RunOrchestrator {
  readonly runId: string;
  private readonly logger: Logger;

  constructor(private readonly options: RunOrchestratorOptions) {
    if (options.concurrency < 1) {
      throw new RangeError(`concurrency must be at least 1, got ${options.concurrency}`);
    }
    this.runId = options.runId ?? randomUUID();
    this.logger = options.logger ?? defaultLogger;
  }

  async run(scenarios: Iterable<Scenario>, options: RunOptions = {}): Promise<RunOutcome> {
    const started = Date.now();
    const jobs: Job[] = [];
    for (const scenario of scenarios) {
      for (const adapter of this.options.adapters) {
        jobs.push({ scenarioId: scenario.id, strategy: adapter.id(), scenario, adapter });
      }
    }
    const scenarioCount = new Set(jobs.map((j) => j.scenarioId)).size;

    const aggregator = new Aggregator({
      runId: this.runId,
      scheduled: jobs.map(({ scenarioId, strategy }) => ({ scenarioId, strategy })),
      startedAt: new Date(started),
    });

    await this.emit({
      ...eventBase(this.runId),
      type: 'RunStarted',
      payload: {
        corpusPath: options.corpusPath ?? '',
        strategies: this.options.adapters.map((a) => a.id()),
        scenarioCount,
        scheduled: jobs.length,
        concurrency: this.options.concurrency,
      },
    });

    let next = 0;
    const worker = async () => {
      while (next < jobs.length) {
        const job = jobs[next++];
        if (!job) break;
        const { verdict, timings } = await this.runOne(job, options.signal);
        aggregator.record(verdict, timings);
        await this.emit({
          ...eventBase(this.runId),
          type: 'VerdictRecorded',
          payload: {
            scenarioId: verdict.scenarioId,
            strategy: verdict.strategy,
            outcome: verdict.outcome,
            ...(verdict.timeoutKind ? { timeoutKind: verdict.timeoutKind } : {}),
            localizationCorrect: verdict.localizationCorrect,
            warnings: verdict.warnings.length,
          },
        });
        this.options.onVerdict?.(verdict, timings, jobs.length);
      }
    };

    const slots = Math.min(this.options.concurrency, Math.max(jobs.length, 1));
    await Promise.all(Array.from({ length: slots }, () => worker()));

    const cancelled = options.signal?.aborted ?? false;
    const report = aggregator.finalize();
    await this.emit({
      ...eventBase(this.runId),
      type: 'RunFinished',
      payload: { recorded: report.recorded, cancelled, durationMs: Date.now() - started },
    });
    return { report, cancelled };
  }

  private async runOne(
    job: Job,
    signal: AbortSignal | undefined,
  ): Promise<{ verdict: Verdict; timings: RunTimings }> {
    const started = Date.now();
    const log = this.logger.child({ scenario: job.scenarioId, strategy: job.strategy });
    const pending: Array<Promise<void>> = [];
    const run = new ScenarioRun(job.scenarioId, job.strategy, (from, to) => {
      pending.push(
        this.emit({
          ...eventBase(this.runId),
          type: 'ScenarioRunStateChanged',
          payload: { scenarioId: job.scenarioId, strategy: job.strategy, from, to },
        }),
      );
    });

    run.transition('Dispatched');
    const agent = await this.dispatch(job, signal, log);

    let execution: ExecutionAttempts | undefined;
    if (agent.kind === 'patch' && agent.patch.edits.length > 0) {
      run.transition('PatchReceived');
      execution = await this.execute(job, agent.patch, signal, log, pending);
      switch (execution.outcome.kind) {
        case 'result':
          run.transition('Executed');
          break;
        case 'sandbox-error':
          run.transition('SandboxFailed');
          break;
        case 'cancelled':
          run.transition('TimedOut');
          break;
      }
    } else if (agent.kind === 'timeout') {
      run.transition('TimedOut');
    } else {
      // Refusals, agent errors and empty patches all end without a patch.
      run.transition('Refused');
    }

    const verdict = classify(job.scenario, job.strategy, agent, execution?.outcome);
    if (run.state === 'Executed') {
      run.transition('Verdicted');
    }
    await Promise.all(pending);

    const generationLatencyMs = agent.kind === 'patch' ? agent.patch.latencyMs : agent.latencyMs;
    const timings: RunTimings = {
      generationLatencyMs,
      ...(execution?.outcome.kind === 'result'
        ? { executionDurationMs: execution.outcome.result.durationMs }
        : {}),
      totalDurationMs: Date.now() - started,
      attempts: execution?.attempts ?? 0,
    };
    await log.debug(`${verdict.outcome}${verdict.timeoutKind ? ` (${verdict.timeoutKind})` : ''}`);
    return { verdict, timings };
  }

  /** Asks the agent for a patch. Never retried. */
  private async dispatch(job: Job, signal: AbortSignal | undefined, log: Logger): Promise<AgentOutcome> {
    const started = Date.now();
    try {
      return await job.adapter.submit(
        {
          scenarioId: job.scenarioId,
          strategy: job.strategy,
          files: job.scenario.files,
          symptom: job.scenario.symptom,
          deadlineMs: this.options.deadlineMs,
        },
        { runId: this.runId, logger: log, abortSignal: signal, timeoutMs: this.options.deadlineMs },
      );
    } catch (error: unknown) {
      const wrapped = new AgentError(`adapter failed unexpectedly: ${messageOf(error)}`, { cause: error });
      await log.error(wrapped);
      return { kind: 'error', message: wrapped.message, latencyMs: Date.now() - started };
    }
  }

  /**
   * Runs the verification command, retrying transient sandbox failures with
   * exponential backoff.
   */
  private async execute(
    job: Job,
    patch: PatchCandidate,
    signal: AbortSignal | undefined,
    log: Logger,
    pending: Array<Promise<void>>,
  ): Promise<ExecutionAttempts> {
    const { retry } = this.options;

    for (let attempt = 1; ; attempt++) {
      if (signal?.aborted) {
        return {
          outcome: { kind: 'cancelled', message: 'run cancelled before execution finished' },
          attempts: attempt - 1,
        };
      }
      try {
        const result = await this.options.sandbox.run(job.scenario, patch, {
          signal,
          onSpawn: (pid, command) => {
            pending.push(
              this.emit({
                ...eventBase(this.runId),
                type: 'VerificationSpawned',
                payload: {
                  scenarioId: job.scenarioId,
                  strategy: job.strategy,
                  ...(pid !== undefined ? { pid } : {}),
                  command,
                },
              }),
            );
          },
        });
        return { outcome: { kind: 'result', result }, attempts: attempt };
      } catch (error: unknown) {
        const sandboxError =
          error instanceof SandboxError
            ? error
            : new SandboxError(`unexpected sandbox failure: ${messageOf(error)}`, {
                phase: 'spawn',
                cause: error,
              });

        if (sandboxError.phase === 'cancelled' || signal?.aborted) {
          return { outcome: { kind: 'cancelled', message: sandboxError.message }, attempts: attempt };
        }
        if (!sandboxError.transient || attempt > retry.count) {
          if (!(error instanceof SandboxError)) await log.error(sandboxError);
          return {
            outcome: { kind: 'sandbox-error', message: sandboxError.message, phase: sandboxError.phase },
            attempts: attempt,
          };
        }

        const delayMs = backoffDelay(retry, attempt);
        await this.emit({
          ...eventBase(this.runId),
          type: 'SandboxRetryScheduled',
          payload: {
            scenarioId: job.scenarioId,
            strategy: job.strategy,
            attempt,
            delayMs,
            error: sandboxError.message,
          },
        });
        await log.warn(`transient sandbox failure (${sandboxError.message}); retry ${attempt} in ${delayMs}ms`);
        await sleep(delayMs, signal);
      }
    }
  }

  private async emit(event: HarnessEvent): Promise<void> {
    await this.logger.log(event);
  }
}
