import { AgentError, firstLine } from '@repairbench/shared';
import type { SubprocessStrategyConfig } from '@repairbench/shared';
import { runProcess } from '@repairbench/exec';
import { BaseAgentAdapter } from '../base-adapter';
import { decodeAgentOutput, parseAgentResponse } from '../protocol';
import type { AgentResponse } from '../protocol';
import type { AdapterContext, RepairRequest } from '../types';

/** Transcript budget for agent stdout; a response larger than this is an error */
const MAX_RESPONSE_BYTES = 16 * 1024 * 1024;

/**
 * Runs an external agent once per request: the request goes to stdin as JSON,
 * the response is read from stdout.
 */
export class SubprocessAgentAdapter extends BaseAgentAdapter {
  constructor(
    private readonly name: string,
    private readonly config: SubprocessStrategyConfig,
  ) {
    super();
  }

  id(): string {
    return this.name;
  }

  protected async generate(req: RepairRequest, ctx: AdapterContext): Promise<AgentResponse> {
    const result = await runProcess(
      {
        command: this.config.command,
        args: this.config.args,
        cwd: this.config.cwd ?? process.cwd(),
        envAllowlist: this.config.envAllowlist,
        input: JSON.stringify(req),
      },
      {
        // The adapter deadline is enforced by the base class; this only bounds the process.
        wallClockMs: ctx.timeoutMs + 1_000,
        maxOutputBytes: MAX_RESPONSE_BYTES,
        killGraceMs: 1_000,
      },
      { signal: ctx.abortSignal },
    );

    if (result.cancelled || result.timedOut) {
      throw new AgentError(`agent ${this.name} was stopped before answering`);
    }
    if (result.exitCode !== 0) {
      const reason = firstLine(result.stderr) || `signal ${result.signal ?? 'unknown'}`;
      throw new AgentError(`agent ${this.name} exited with code ${String(result.exitCode)}: ${reason}`, {
        details: { exitCode: result.exitCode, signal: result.signal },
      });
    }
    if (result.stdoutTruncated) {
      throw new AgentError(`agent ${this.name} response exceeds ${MAX_RESPONSE_BYTES} bytes`);
    }

    let decoded: unknown;
    try {
      decoded = decodeAgentOutput(result.stdout);
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      throw new AgentError(`agent ${this.name} produced unparsable output: ${message}`, {
        cause: error,
      });
    }

    const parsed = parseAgentResponse(decoded);
    if (!parsed.success) {
      throw new AgentError(`agent ${this.name}: ${parsed.message}`);
    }
    return parsed.data;
  }
}
