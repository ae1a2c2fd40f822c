import type { AgentOutcome } from '@repairbench/shared';
import type { AdapterContext, RepairRequest } from './types';

/**
 * Interface for repair-agent adapters.
 * Adapters give the orchestrator one way to ask any strategy for a patch
 * (an external process, recorded responses, a scripted fake).
 *
 * @example
 * ```typescript
 * class MyAdapter extends BaseAgentAdapter {
 *   id() { return 'my-agent'; }
 *   protected async generate(req, ctx) { return { edits: [] }; }
 * }
 * ```
 */
export interface AgentAdapter {
  /**
   * Returns the strategy identifier this adapter answers for.
   */
  id(): string;
  /**
   * Ask the agent for a patch.
   *
   * Never rejects and never outlives `ctx.timeoutMs`: every failure mode of the
   * agent is reported as an outcome.
   */
  submit(req: RepairRequest, ctx: AdapterContext): Promise<AgentOutcome>;
}
