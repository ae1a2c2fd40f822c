import {
  SandboxError,
  ProcessError,
  applyEditsToTree,
  logger as defaultLogger,
} from '@repairbench/shared';
import type {
  ExecutionResult,
  LimitsConfig,
  Logger,
  PatchCandidate,
  Scenario,
} from '@repairbench/shared';
import { runProcess } from '../runner/runner';
import type { ProcessLimits, ProcessRunResult } from '../runner/runner';
import { createWorkspace, isTransientErrno, removeWorkspace, writeFiles } from './workspace';

export interface SandboxExecutorOptions {
  limits: LimitsConfig;
  /** Parent directory for workspaces; defaults to the OS temp dir */
  tmpRoot?: string;
  /** Extra environment variables passed to verification commands */
  envAllowlist?: readonly string[];
  logger?: Logger;
}

export interface SandboxRunOptions {
  signal?: AbortSignal;
  /** Called once the verification command is running */
  onSpawn?: (pid: number | undefined, command: string) => void;
}

/**
 * Runs a scenario's verification command against a patched copy of its tree.
 *
 * Each call gets its own workspace, removed on every exit path. Patch problems
 * surface as SandboxError before anything executes.
 */
export class SandboxExecutor {
  private readonly limits: ProcessLimits;
  private readonly logger: Logger;

  constructor(private readonly options: SandboxExecutorOptions) {
    this.limits = {
      wallClockMs: options.limits.wallClockMs,
      cpuSeconds: options.limits.cpuSeconds,
      memoryMb: options.limits.memoryMb,
      maxOutputBytes: options.limits.maxOutputBytes,
      killGraceMs: options.limits.killGraceMs,
    };
    this.logger = options.logger ?? defaultLogger;
  }

  async run(
    scenario: Scenario,
    patch: PatchCandidate,
    options: SandboxRunOptions = {},
  ): Promise<ExecutionResult> {
    const patched = applyEditsToTree(scenario.files, patch.edits);
    if (!patched.ok) {
      throw new SandboxError(`Patch rejected: ${patched.failure.message}`, {
        phase: 'patch',
        details: { editIndex: patched.failure.index, kind: patched.failure.kind },
      });
    }
    throwIfCancelled(options.signal);

    const dir = await createWorkspace(this.options.tmpRoot);
    try {
      await writeFiles(dir, scenario.files, 'materialize');
      const touched = Object.fromEntries(patched.touched.map((p) => [p, patched.tree[p] ?? '']));
      await writeFiles(dir, touched, 'patch');
      throwIfCancelled(options.signal);

      await this.logger.debug(
        `[${scenario.id}/${patch.strategy}] running "${scenario.verificationCommand}" in ${dir}`,
      );
      const result = await this.spawn(scenario, dir, options);
      if (result.cancelled) {
        throw new SandboxError('Run cancelled during verification', { phase: 'cancelled' });
      }

      return {
        scenarioId: scenario.id,
        strategy: patch.strategy,
        exitCode: result.exitCode,
        signal: result.signal,
        stdout: result.stdout,
        stderr: result.stderr,
        stdoutTruncated: result.stdoutTruncated,
        stderrTruncated: result.stderrTruncated,
        durationMs: result.durationMs,
        resourceExceeded: result.resourceExceeded,
        ...(result.breachedLimit ? { breachedLimit: result.breachedLimit } : {}),
      };
    } finally {
      await removeWorkspace(dir);
    }
  }

  private async spawn(
    scenario: Scenario,
    cwd: string,
    options: SandboxRunOptions,
  ): Promise<ProcessRunResult> {
    try {
      return await runProcess(
        {
          command: scenario.verificationCommand,
          cwd,
          envAllowlist: this.options.envAllowlist,
          env: { PYTHONDONTWRITEBYTECODE: '1' },
        },
        this.limits,
        {
          signal: options.signal,
          onSpawn: (pid) => options.onSpawn?.(pid, scenario.verificationCommand),
        },
      );
    } catch (error: unknown) {
      if (error instanceof ProcessError) {
        throw new SandboxError(error.message, {
          phase: 'spawn',
          transient: isTransientErrno(error.cause),
          cause: error,
        });
      }
      throw error;
    }
  }
}

function throwIfCancelled(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new SandboxError('Run cancelled before verification', { phase: 'cancelled' });
  }
}
