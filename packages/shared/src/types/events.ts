import type { RunState } from './run-state';
import type { TimeoutKind, VerdictOutcome } from './results';

/**
 * Base interface for all harness events.
 * All events include common metadata fields.
 */
export interface BaseEvent {
  /** Schema version for event format compatibility */
  schemaVersion: number;
  /** ISO 8601 timestamp when the event occurred */
  timestamp: string;
  /** Unique identifier for the benchmark run */
  runId: string;
  /** Event type discriminator */
  type: string;
}

/**
 * Emitted when a benchmark run starts, after the corpus has loaded.
 */
export interface RunStarted extends BaseEvent {
  type: 'RunStarted';
  payload: {
    corpusPath: string;
    strategies: string[];
    scenarioCount: number;
    /** Number of (scenario, strategy) runs scheduled */
    scheduled: number;
    concurrency: number;
  };
}

/** Emitted on every state-machine transition of a scenario-run */
export interface ScenarioRunStateChanged extends BaseEvent {
  type: 'ScenarioRunStateChanged';
  payload: {
    scenarioId: string;
    strategy: string;
    from: RunState;
    to: RunState;
  };
}

/** Emitted when a transient sandbox failure will be retried */
export interface SandboxRetryScheduled extends BaseEvent {
  type: 'SandboxRetryScheduled';
  payload: {
    scenarioId: string;
    strategy: string;
    attempt: number;
    delayMs: number;
    error: string;
  };
}

/** Emitted when the verification command has been spawned in a workspace */
export interface VerificationSpawned extends BaseEvent {
  type: 'VerificationSpawned';
  payload: {
    scenarioId: string;
    strategy: string;
    pid?: number;
    command: string;
  };
}

/** Emitted once a terminal verdict has been recorded */
export interface VerdictRecorded extends BaseEvent {
  type: 'VerdictRecorded';
  payload: {
    scenarioId: string;
    strategy: string;
    outcome: VerdictOutcome;
    timeoutKind?: TimeoutKind;
    localizationCorrect: boolean;
    warnings: number;
  };
}

/** Emitted when every scheduled run has reached a terminal state */
export interface RunFinished extends BaseEvent {
  type: 'RunFinished';
  payload: {
    recorded: number;
    cancelled: boolean;
    durationMs: number;
  };
}

export type HarnessEvent =
  | RunStarted
  | ScenarioRunStateChanged
  | SandboxRetryScheduled
  | VerificationSpawned
  | VerdictRecorded
  | RunFinished;

export type HarnessEventType = HarnessEvent['type'];

export const EVENT_SCHEMA_VERSION = 1;

/**
 * Common metadata for a new event; spread it into the event literal.
 */
export function eventBase(runId: string): Omit<BaseEvent, 'type'> {
  return {
    schemaVersion: EVENT_SCHEMA_VERSION,
    timestamp: new Date().toISOString(),
    runId,
  };
}
