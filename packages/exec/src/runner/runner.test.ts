import os from 'os';
import { ProcessError, TRUNCATION_MARKER } from '@repairbench/shared';
import { getSafeEnv, runProcess } from './runner';
import type { ProcessLimits } from './runner';

const limits: ProcessLimits = {
  wallClockMs: 10_000,
  maxOutputBytes: 64 * 1024,
  killGraceMs: 200,
};

describe('getSafeEnv', () => {
  it('keeps PATH and baseline keys only', () => {
    const env = getSafeEnv([], { PATH: '/bin', HOME: '/home/u', API_TOKEN: 'test-secret' });
    expect(env).toEqual({ PATH: '/bin', HOME: '/home/u' });
  });

  it('passes allowlisted keys and applies overrides last', () => {
    const env = getSafeEnv(['API_TOKEN'], { PATH: '/bin', API_TOKEN: 'test-secret' }, { PATH: '/x' });
    expect(env).toEqual({ PATH: '/x', API_TOKEN: 'test-secret' });
  });
});

describe.runIf(process.platform !== 'win32')('runProcess', () => {
  const cwd = os.tmpdir();

  it('captures exit code and output', async () => {
    const result = await runProcess({ command: 'echo hello; echo oops >&2; exit 3', cwd }, limits);

    expect(result.exitCode).toBe(3);
    expect(result.stdout).toBe('hello\n');
    expect(result.stderr).toBe('oops\n');
    expect(result.resourceExceeded).toBe(false);
    expect(result.timedOut).toBe(false);
  });

  it('kills a command that outlives the wall-clock limit', async () => {
    const started = Date.now();
    const result = await runProcess(
      { command: 'while :; do :; done', cwd },
      { ...limits, wallClockMs: 300, killGraceMs: 100 },
    );

    expect(result.timedOut).toBe(true);
    expect(result.resourceExceeded).toBe(true);
    expect(result.breachedLimit).toBe('wall-clock');
    expect(Date.now() - started).toBeLessThan(5_000);
  });

  it('escalates to SIGKILL when SIGTERM is ignored', async () => {
    const result = await runProcess(
      { command: "trap '' TERM; while :; do :; done", cwd },
      { ...limits, wallClockMs: 200, killGraceMs: 200 },
    );

    expect(result.signal).toBe('SIGKILL');
    expect(result.breachedLimit).toBe('wall-clock');
  });

  it('reports a CPU ceiling breach', async () => {
    const result = await runProcess(
      { command: 'while :; do :; done', cwd },
      { ...limits, cpuSeconds: 1 },
    );

    expect(result.timedOut).toBe(false);
    expect(result.resourceExceeded).toBe(true);
    expect(result.breachedLimit).toBe('cpu');
  });

  it('reports a memory ceiling breach from an allocation failure', async () => {
    const result = await runProcess(
      { command: 'echo "MemoryError: cannot allocate 1000000000 bytes" >&2; exit 1', cwd },
      { ...limits, memoryMb: 256 },
    );

    expect(result.exitCode).toBe(1);
    expect(result.resourceExceeded).toBe(true);
    expect(result.breachedLimit).toBe('memory');
  });

  it('reports the memory breach when stderr overflows the cap first', async () => {
    const result = await runProcess(
      {
        command: "head -c 2000 /dev/zero | tr '\\000' w >&2; echo 'MemoryError' >&2; exit 1",
        cwd,
      },
      { ...limits, memoryMb: 256, maxOutputBytes: 1024 },
    );

    expect(result.stderrTruncated).toBe(true);
    expect(result.stderr).toBe(`${'w'.repeat(1024)}${TRUNCATION_MARKER}`);
    expect(result.resourceExceeded).toBe(true);
    expect(result.breachedLimit).toBe('memory');
  });

  it('treats a kill the harness did not send as a memory breach', async () => {
    const result = await runProcess(
      { command: 'kill -9 $$', cwd },
      { ...limits, cpuSeconds: 20, memoryMb: 256 },
    );

    expect(result.signal).toBe('SIGKILL');
    expect(result.breachedLimit).toBe('memory');
  });

  it('does not report a breach for an ordinary failing exit', async () => {
    const result = await runProcess(
      { command: 'echo MemoryError >&2; exit 137', cwd },
      { ...limits, cpuSeconds: 20 },
    );

    expect(result.exitCode).toBe(137);
    expect(result.resourceExceeded).toBe(false);
    expect(result.breachedLimit).toBeUndefined();
  });

  it('truncates output past the cap with a marker', async () => {
    const result = await runProcess(
      { command: "head -c 5000 /dev/zero | tr '\\000' a", cwd },
      { ...limits, maxOutputBytes: 1024 },
    );

    expect(result.stdoutTruncated).toBe(true);
    expect(result.stdout).toBe(`${'a'.repeat(1024)}${TRUNCATION_MARKER}`);
    expect(result.exitCode).toBe(0);
  });

  it('stops the process group when the signal aborts', async () => {
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 100);

    const result = await runProcess({ command: 'sleep 30', cwd }, limits, {
      signal: controller.signal,
    });

    expect(result.cancelled).toBe(true);
    expect(result.resourceExceeded).toBe(false);
    expect(result.durationMs).toBeLessThan(5_000);
  });

  it('writes input to stdin and keeps argv intact', async () => {
    const result = await runProcess(
      { command: 'sh', args: ['-c', 'cat; printf "%s|" "$@"', 'argv0', 'a b', 'c'], cwd, input: 'ping\n' },
      limits,
    );

    expect(result.stdout).toBe('ping\na b|c|');
  });

  it('does not leak unlisted environment variables', async () => {
    vi.stubEnv('REPAIRBENCH_TEST_TOKEN', 'test-secret');
    const result = await runProcess(
      { command: 'printf "[%s]" "$REPAIRBENCH_TEST_TOKEN"', cwd, env: {} },
      limits,
    );
    expect(result.stdout).toBe('[]');

    const listed = await runProcess(
      { command: 'printf "[%s]" "$EXTRA"', cwd, env: { EXTRA: 'test-secret' } },
      limits,
    );
    expect(listed.stdout).toBe('[test-secret]');
    vi.unstubAllEnvs();
  });

  it('reports the pid through onSpawn', async () => {
    const onSpawn = vi.fn();
    const result = await runProcess({ command: 'true', cwd }, limits, { onSpawn });

    expect(onSpawn).toHaveBeenCalledWith(result.pid);
  });

  it('rejects with ProcessError when the process cannot start', async () => {
    await expect(
      runProcess({ command: 'true', cwd: '/definitely/not/here' }, limits),
    ).rejects.toBeInstanceOf(ProcessError);
  });
});
