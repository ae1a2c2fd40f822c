import { describe, it, expect } from 'vitest';
import { ConsoleLogger } from '@repairbench/shared';
import { ScriptedAgentAdapter } from './adapter';
import type { AdapterContext, RepairRequest } from '../types';

const request: RepairRequest = {
  scenarioId: 's1',
  strategy: 'scripted',
  files: { 'main.py': 'print(x)\n' },
  symptom: "NameError: name 'x' is not defined",
  deadlineMs: 1_000,
};

function context(overrides: Partial<AdapterContext> = {}): AdapterContext {
  return { runId: 'test-run', logger: new ConsoleLogger(), timeoutMs: 1_000, ...overrides };
}

describe('ScriptedAgentAdapter', () => {
  it('maps edits to a patch candidate', async () => {
    const adapter = new ScriptedAgentAdapter('scripted', {
      s1: { respond: { edits: [{ path: 'main.py', content: 'x = 1\nprint(x)\n' }] } },
    });

    const outcome = await adapter.submit(request, context());

    expect(outcome.kind).toBe('patch');
    if (outcome.kind !== 'patch') return;
    expect(outcome.patch.scenarioId).toBe('s1');
    expect(outcome.patch.strategy).toBe('scripted');
    expect(outcome.patch.edits).toEqual([
      { kind: 'write', path: 'main.py', content: 'x = 1\nprint(x)\n' },
    ]);
    expect(adapter.calls).toEqual([request]);
  });

  it('maps diff edits', async () => {
    const adapter = new ScriptedAgentAdapter('scripted', {
      s1: { respond: { edits: [{ path: 'main.py', diff: '@@ -1 +1 @@\n-a\n+b\n' }] } },
    });

    const outcome = await adapter.submit(request, context());
    expect(outcome).toMatchObject({
      kind: 'patch',
      patch: { edits: [{ kind: 'diff', path: 'main.py', diff: '@@ -1 +1 @@\n-a\n+b\n' }] },
    });
  });

  it('treats an empty edit list as a refusal', async () => {
    const adapter = new ScriptedAgentAdapter('scripted', { s1: { respond: { edits: [] } } });
    const outcome = await adapter.submit(request, context());
    expect(outcome).toMatchObject({ kind: 'refusal', reason: 'empty patch' });
  });

  it('reports refusals and agent-declared errors', async () => {
    const refusing = new ScriptedAgentAdapter('scripted', { s1: { respond: { refusal: 'unsure' } } });
    expect(await refusing.submit(request, context())).toMatchObject({ kind: 'refusal', reason: 'unsure' });

    const failing = new ScriptedAgentAdapter('scripted', { s1: { respond: { error: 'model overloaded' } } });
    expect(await failing.submit(request, context())).toMatchObject({
      kind: 'error',
      message: 'model overloaded',
    });
  });

  it('turns a thrown error into an error outcome', async () => {
    const adapter = new ScriptedAgentAdapter('scripted', { s1: { fail: 'crashed' } });
    expect(await adapter.submit(request, context())).toMatchObject({ kind: 'error', message: 'crashed' });
  });

  it('refuses scenarios missing from the script', async () => {
    const adapter = new ScriptedAgentAdapter('scripted', {});
    expect(await adapter.submit(request, context())).toMatchObject({
      kind: 'refusal',
      reason: 'no scripted response',
    });
  });

  it('resolves Timeout at the deadline even when the agent hangs', async () => {
    const adapter = new ScriptedAgentAdapter('scripted', { s1: { hang: true } });
    const started = Date.now();

    const outcome = await adapter.submit(request, context({ timeoutMs: 100 }));

    expect(outcome.kind).toBe('timeout');
    expect(outcome).not.toHaveProperty('cancelled');
    expect(Date.now() - started).toBeLessThan(2_000);
  });

  it('times out an agent slower than its deadline', async () => {
    const adapter = new ScriptedAgentAdapter('scripted', {
      s1: { respond: { refusal: 'late' }, delayMs: 500 },
    });
    expect((await adapter.submit(request, context({ timeoutMs: 50 }))).kind).toBe('timeout');
  });

  it('does not invoke the agent when already cancelled', async () => {
    const adapter = new ScriptedAgentAdapter('scripted', { s1: { respond: { refusal: 'x' } } });
    const controller = new AbortController();
    controller.abort();

    const outcome = await adapter.submit(request, context({ abortSignal: controller.signal }));

    expect(outcome).toEqual({ kind: 'timeout', latencyMs: 0, cancelled: true });
    expect(adapter.calls).toHaveLength(0);
  });

  it('stops waiting when cancelled mid-flight', async () => {
    const adapter = new ScriptedAgentAdapter('scripted', { s1: { hang: true } });
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 50);

    const outcome = await adapter.submit(
      request,
      context({ abortSignal: controller.signal, timeoutMs: 10_000 }),
    );

    expect(outcome).toMatchObject({ kind: 'timeout', cancelled: true });
  });

  it('accepts a script function', async () => {
    const adapter = new ScriptedAgentAdapter('scripted', (req) => ({
      respond: { refusal: `saw ${req.scenarioId}` },
    }));
    expect(await adapter.submit(request, context())).toMatchObject({ reason: 'saw s1' });
  });
});
