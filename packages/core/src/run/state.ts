import { AppError, RUN_TRANSITIONS } from '@repairbench/shared';
import type { RunState } from '@repairbench/shared';

export type TransitionListener = (from: RunState, to: RunState) => void;

/**
 * Lifecycle of one (scenario, strategy) run. Transitions outside
 * RUN_TRANSITIONS throw.
 */
export class ScenarioRun {
  private current: RunState = 'Queued';

  constructor(
    readonly scenarioId: string,
    readonly strategy: string,
    private readonly onTransition?: TransitionListener,
  ) {}

  get state(): RunState {
    return this.current;
  }

  transition(to: RunState): void {
    const from = this.current;
    if (!RUN_TRANSITIONS[from].includes(to)) {
      throw new AppError(
        'UnknownError',
        `Illegal transition ${from} -> ${to} for ${this.scenarioId}/${this.strategy}`,
        { details: { from, to } },
      );
    }
    this.current = to;
    this.onTransition?.(from, to);
  }
}
