import fs from 'fs-extra';
import path from 'path';
import { AgentError } from '@repairbench/shared';
import type { ReplayStrategyConfig } from '@repairbench/shared';
import { BaseAgentAdapter } from '../base-adapter';
import { parseAgentResponse } from '../protocol';
import type { AgentResponse } from '../protocol';
import type { AdapterContext, RepairRequest } from '../types';

/**
 * File name a recorded response is stored under for a scenario id.
 */
export function replayFileName(scenarioId: string): string {
  return `${scenarioId.replace(/[\\/:]/g, '_')}.json`;
}

/**
 * Answers from previously captured agent responses, one `<scenarioId>.json` per
 * scenario. A scenario with no recording is treated as a refusal.
 */
export class ReplayAgentAdapter extends BaseAgentAdapter {
  constructor(
    private readonly name: string,
    private readonly config: ReplayStrategyConfig,
  ) {
    super();
  }

  id(): string {
    return this.name;
  }

  protected async generate(req: RepairRequest, _ctx: AdapterContext): Promise<AgentResponse> {
    const file = path.join(this.config.dir, replayFileName(req.scenarioId));
    if (!(await fs.pathExists(file))) {
      return { refusal: `no recorded response for scenario ${req.scenarioId}` };
    }

    let raw: unknown;
    try {
      raw = await fs.readJson(file);
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      throw new AgentError(`recorded response ${path.basename(file)} is not valid JSON: ${message}`, {
        cause: error,
      });
    }

    const parsed = parseAgentResponse(raw);
    if (!parsed.success) {
      throw new AgentError(`recorded response ${path.basename(file)}: ${parsed.message}`);
    }
    return parsed.data;
  }
}
