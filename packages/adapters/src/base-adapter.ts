import type { AgentOutcome } from '@repairbench/shared';
import type { AgentAdapter } from './adapter';
import type { AgentResponse } from './protocol';
import { toFileEdits } from './protocol';
import type { AdapterContext, RepairRequest } from './types';

type Settled = { ok: true; response: AgentResponse } | { ok: false; error: unknown };

/**
 * Base class for agent adapters that provides deadline enforcement and outcome
 * mapping. Subclasses only produce the agent's raw response.
 */
export abstract class BaseAgentAdapter implements AgentAdapter {
  abstract id(): string;

  /**
   * Produces the agent's response. `ctx.abortSignal` fires at the deadline; an
   * implementation that ignores it is abandoned, not awaited.
   */
  protected abstract generate(req: RepairRequest, ctx: AdapterContext): Promise<AgentResponse>;

  async submit(req: RepairRequest, ctx: AdapterContext): Promise<AgentOutcome> {
    const start = Date.now();
    const elapsed = () => Date.now() - start;

    if (ctx.abortSignal?.aborted) {
      return { kind: 'timeout', latencyMs: 0, cancelled: true };
    }

    const controller = new AbortController();
    const onAbort = () => controller.abort();
    ctx.abortSignal?.addEventListener('abort', onAbort, { once: true });

    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<'deadline'>((resolve) => {
      timer = setTimeout(() => resolve('deadline'), ctx.timeoutMs);
      controller.signal.addEventListener('abort', () => resolve('deadline'), { once: true });
    });

    const work: Promise<Settled> = Promise.resolve()
      .then(() => this.generate(req, { ...ctx, abortSignal: controller.signal }))
      .then(
        (response): Settled => ({ ok: true, response }),
        (error: unknown): Settled => ({ ok: false, error }),
      );

    try {
      const settled = await Promise.race([work, deadline]);
      if (settled === 'deadline') {
        const cancelled = ctx.abortSignal?.aborted ?? false;
        controller.abort();
        await ctx.logger.debug(
          `[${req.scenarioId}/${this.id()}] agent ${cancelled ? 'cancelled' : 'missed its deadline'} after ${elapsed()}ms`,
        );
        return { kind: 'timeout', latencyMs: elapsed(), ...(cancelled ? { cancelled } : {}) };
      }
      if (!settled.ok) {
        const message = settled.error instanceof Error ? settled.error.message : String(settled.error);
        return { kind: 'error', message, latencyMs: elapsed() };
      }
      return this.toOutcome(req, settled.response, elapsed());
    } finally {
      clearTimeout(timer);
      ctx.abortSignal?.removeEventListener('abort', onAbort);
    }
  }

  protected toOutcome(req: RepairRequest, response: AgentResponse, latencyMs: number): AgentOutcome {
    if ('refusal' in response) {
      return { kind: 'refusal', reason: response.refusal, latencyMs };
    }
    if ('error' in response) {
      return { kind: 'error', message: response.error, latencyMs };
    }
    if (response.edits.length === 0) {
      return { kind: 'refusal', reason: 'empty patch', latencyMs };
    }
    return {
      kind: 'patch',
      patch: {
        scenarioId: req.scenarioId,
        strategy: req.strategy,
        edits: toFileEdits(response.edits),
        latencyMs,
      },
    };
  }
}
