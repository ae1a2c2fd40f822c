import { BaseAgentAdapter } from '../base-adapter';
import type { AgentResponse } from '../protocol';
import type { AdapterContext, RepairRequest } from '../types';

/**
 * One scripted agent behaviour. Delays ignore cancellation, like a stuck agent.
 */
export type ScriptedStep =
  | { respond: AgentResponse; delayMs?: number }
  | { fail: string; delayMs?: number }
  | { hang: true };

export type AgentScript =
  | Readonly<Record<string, ScriptedStep>>
  | ((req: RepairRequest) => ScriptedStep);

const NO_SCRIPT: ScriptedStep = { respond: { refusal: 'no scripted response' } };

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * In-process agent for tests and dry runs: answers each scenario from a script.
 */
export class ScriptedAgentAdapter extends BaseAgentAdapter {
  /** Every request this adapter was asked to answer, in order */
  readonly calls: RepairRequest[] = [];

  constructor(
    private readonly name: string,
    private readonly script: AgentScript,
  ) {
    super();
  }

  id(): string {
    return this.name;
  }

  protected async generate(req: RepairRequest, _ctx: AdapterContext): Promise<AgentResponse> {
    this.calls.push(req);
    const step =
      typeof this.script === 'function' ? this.script(req) : (this.script[req.scenarioId] ?? NO_SCRIPT);

    if ('hang' in step) {
      return new Promise<AgentResponse>(() => undefined);
    }
    if (step.delayMs) await sleep(step.delayMs);
    if ('fail' in step) {
      throw new Error(step.fail);
    }
    return step.respond;
  }
}
