/**
 * Lifecycle of a single (scenario, strategy) run.
 */
export type RunState =
  | 'Queued'
  | 'Dispatched'
  | 'PatchReceived'
  | 'Refused'
  | 'TimedOut'
  | 'Executed'
  | 'SandboxFailed'
  | 'Verdicted';

// States with no outgoing transitions are terminal.
export const RUN_TRANSITIONS: Readonly<Record<RunState, readonly RunState[]>> = {
  Queued: ['Dispatched'],
  Dispatched: ['PatchReceived', 'Refused', 'TimedOut'],
  // TimedOut here covers a run cancelled while the sandbox was executing.
  PatchReceived: ['Executed', 'SandboxFailed', 'TimedOut'],
  Executed: ['Verdicted'],
  Refused: [],
  TimedOut: [],
  SandboxFailed: [],
  Verdicted: [],
};
