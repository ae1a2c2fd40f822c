import { spawn, spawnSync } from 'child_process';
import { isWindows, ProcessError } from '@repairbench/shared';
import type { LimitKind } from '@repairbench/shared';
import { BoundedOutput } from './output';

/**
 * Sends a signal to a child's whole process group. The child must have been
 * spawned with `detached: true`.
 *
 * @returns false when no process in the group was left to signal.
 */
export function killProcessTree(pid: number, signal: NodeJS.Signals = 'SIGTERM'): boolean {
  if (isWindows()) {
    // process.kill does not reach grandchildren on Windows.
    const result = spawnSync('taskkill', ['/PID', String(pid), '/T', '/F']);
    return result.status === 0;
  }
  try {
    process.kill(-pid, signal);
    return true;
  } catch (error: unknown) {
    if (errnoCode(error) === 'ESRCH') return false;
    throw error;
  }
}

export function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

// Minimal env vars that are safe and commonly needed by interpreters.
// Anything else must be allowlisted explicitly.
const BASELINE_ENV_KEYS = [
  'HOME',
  'USER',
  'LOGNAME',
  'SHELL',
  'TERM',
  'LANG',
  'LC_ALL',
  'LC_CTYPE',
  'TMPDIR',
  'TMP',
  'TEMP',
  // Windows
  'USERPROFILE',
  'SYSTEMROOT',
  'COMSPEC',
  'PATHEXT',
];

export function getSafeEnv(
  envAllowlist: readonly string[],
  baseEnv: NodeJS.ProcessEnv,
  overrides: Record<string, string> = {},
): Record<string, string> {
  const safeEnv: Record<string, string> = {};

  // Always include PATH for basic command resolution.
  const pathValue = baseEnv.PATH ?? baseEnv.Path;
  if (pathValue) {
    safeEnv.PATH = pathValue;
  }

  for (const key of [...BASELINE_ENV_KEYS, ...envAllowlist]) {
    const value = baseEnv[key];
    if (value === undefined) continue;
    safeEnv[key] = value;
  }

  return { ...safeEnv, ...overrides };
}

export interface ProcessLimits {
  wallClockMs: number;
  /** `ulimit -t` ceiling; POSIX only */
  cpuSeconds?: number;
  /** `ulimit -v` ceiling; POSIX only */
  memoryMb?: number;
  /** Per-stream capture cap */
  maxOutputBytes: number;
  /** Delay between SIGTERM and SIGKILL */
  killGraceMs: number;
}

export interface ProcessRequest {
  /** Shell command line, or the executable when `args` is given */
  command: string;
  args?: string[];
  cwd: string;
  envAllowlist?: readonly string[];
  env?: Record<string, string>;
  /** Written to stdin, which is then closed */
  input?: string;
}

export interface ProcessRunOptions {
  signal?: AbortSignal;
  onSpawn?: (pid: number | undefined) => void;
}

export interface ProcessRunResult {
  pid?: number;
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
  stdoutTruncated: boolean;
  stderrTruncated: boolean;
  durationMs: number;
  /** Killed by the harness after the wall-clock limit */
  timedOut: boolean;
  /** Killed by the harness because the abort signal fired */
  cancelled: boolean;
  resourceExceeded: boolean;
  breachedLimit?: LimitKind;
  /** Set when the child closed stdin before the request was written */
  inputError?: string;
}

// 128 + SIGXCPU(24), as reported by a wrapping shell.
const CPU_LIMIT_EXIT_CODE = 152;
const MEMORY_FAILURE_PATTERN = /MemoryError|Cannot allocate memory|out of memory|std::bad_alloc/;

function limitPrefix(limits: ProcessLimits): string {
  const parts: string[] = [];
  if (limits.cpuSeconds !== undefined) {
    // Soft limit only: the kernel then signals SIGXCPU rather than SIGKILL.
    parts.push(`ulimit -S -t ${Math.ceil(limits.cpuSeconds)} 2>/dev/null;`);
  }
  if (limits.memoryMb !== undefined) {
    parts.push(`ulimit -v ${Math.floor(limits.memoryMb * 1024)} 2>/dev/null;`);
  }
  return parts.length > 0 ? `${parts.join(' ')} ` : '';
}

function buildInvocation(
  req: ProcessRequest,
  limits: ProcessLimits,
): { bin: string; args: string[]; shell: boolean } {
  if (isWindows()) {
    return req.args
      ? { bin: req.command, args: req.args, shell: false }
      : { bin: req.command, args: [], shell: true };
  }
  const prefix = limitPrefix(limits);
  if (req.args) {
    // "$0" "$@" keeps the argv intact through the wrapping shell.
    return { bin: '/bin/sh', args: ['-c', `${prefix}exec "$0" "$@"`, req.command, ...req.args], shell: false };
  }
  return { bin: '/bin/sh', args: ['-c', `${prefix}${req.command}`], shell: false };
}

function classifyBreach(
  result: Pick<ProcessRunResult, 'exitCode' | 'signal' | 'timedOut'>,
  killedByHarness: boolean,
  allocationFailed: boolean,
  limits: ProcessLimits,
): LimitKind | undefined {
  if (result.timedOut) return 'wall-clock';
  if (limits.cpuSeconds !== undefined) {
    if (result.signal === 'SIGXCPU' || result.exitCode === CPU_LIMIT_EXIT_CODE) return 'cpu';
  }
  if (limits.memoryMb !== undefined && result.exitCode !== 0) {
    // An allocation failure reported by the command, or the kernel's OOM kill.
    if (allocationFailed) return 'memory';
    if (result.signal === 'SIGKILL' && !killedByHarness) return 'memory';
  }
  return undefined;
}

/**
 * Runs a command in its own process group under the given limits.
 *
 * Resolves once the process and its stdio have closed. Limit breaches and
 * cancellation are reported on the result; only a failure to start the process
 * rejects, with a ProcessError whose cause carries the errno.
 */
export function runProcess(
  req: ProcessRequest,
  limits: ProcessLimits,
  options: ProcessRunOptions = {},
): Promise<ProcessRunResult> {
  const { bin, args, shell } = buildInvocation(req, limits);
  const env = getSafeEnv(req.envAllowlist ?? [], process.env, req.env);
  const stdout = new BoundedOutput(limits.maxOutputBytes);
  const stderr = new BoundedOutput(limits.maxOutputBytes, MEMORY_FAILURE_PATTERN);

  return new Promise<ProcessRunResult>((resolve, reject) => {
    const start = Date.now();
    let settled = false;
    let timedOut = false;
    let cancelled = false;
    let killedByHarness = false;
    let inputError: string | undefined;
    let graceTimer: NodeJS.Timeout | undefined;

    const child = spawn(bin, args, {
      cwd: req.cwd,
      env,
      stdio: [req.input === undefined ? 'ignore' : 'pipe', 'pipe', 'pipe'],
      shell,
      detached: true,
    });

    const terminate = () => {
      if (child.pid === undefined || killedByHarness) return;
      killedByHarness = true;
      killProcessTree(child.pid, 'SIGTERM');
      const pid = child.pid;
      graceTimer = setTimeout(() => killProcessTree(pid, 'SIGKILL'), limits.killGraceMs);
    };

    const wallClockTimer = setTimeout(() => {
      timedOut = true;
      terminate();
    }, limits.wallClockMs);

    const onAbort = () => {
      cancelled = true;
      terminate();
    };

    const cleanup = () => {
      settled = true;
      clearTimeout(wallClockTimer);
      if (graceTimer) clearTimeout(graceTimer);
      options.signal?.removeEventListener('abort', onAbort);
    };

    child.stdout?.on('data', (chunk: Buffer) => stdout.push(chunk));
    child.stderr?.on('data', (chunk: Buffer) => stderr.push(chunk));

    if (child.stdin && req.input !== undefined) {
      child.stdin.on('error', (err) => {
        inputError = err.message;
      });
      child.stdin.end(req.input);
    }

    child.on('spawn', () => {
      options.onSpawn?.(child.pid);
      if (options.signal?.aborted) {
        onAbort();
      } else {
        options.signal?.addEventListener('abort', onAbort, { once: true });
      }
    });

    child.on('exit', () => {
      // Reap anything the command left running in its group.
      if (child.pid !== undefined && !isWindows()) {
        killProcessTree(child.pid, 'SIGKILL');
      }
    });

    child.on('error', (err) => {
      if (settled) return;
      cleanup();
      reject(
        new ProcessError(`Failed to start process: ${err.message}`, {
          cause: err,
          details: { command: req.command },
        }),
      );
    });

    child.on('close', (code, signal) => {
      if (settled) return;
      cleanup();

      const base = { exitCode: code, signal, timedOut };
      const breachedLimit = cancelled
        ? undefined
        : classifyBreach(base, killedByHarness, stderr.sawWatched, limits);

      resolve({
        pid: child.pid,
        ...base,
        stdout: stdout.text(),
        stderr: stderr.text(),
        stdoutTruncated: stdout.truncated,
        stderrTruncated: stderr.truncated,
        durationMs: Date.now() - start,
        cancelled,
        resourceExceeded: breachedLimit !== undefined,
        ...(breachedLimit ? { breachedLimit } : {}),
        ...(inputError !== undefined ? { inputError } : {}),
      });
    });
  });
}
