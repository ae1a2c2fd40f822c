import type { FileTree, Logger } from '@repairbench/shared';

/**
 * What a repair agent is asked to fix. Serialized as JSON for external agents.
 */
export interface RepairRequest {
  scenarioId: string;
  strategy: string;
  /** The scenario's files, unmodified */
  files: FileTree;
  symptom: string;
  /** Time the agent has to answer */
  deadlineMs: number;
}

/**
 * Context passed to adapter methods for each request.
 * Provides access to logging, cancellation, and the deadline.
 */
export interface AdapterContext {
  /** Unique identifier for the current benchmark run */
  runId: string;
  /** Logger instance for this request */
  logger: Logger;
  /** Signal to cancel the request */
  abortSignal?: AbortSignal;
  /** Deadline for the request in milliseconds */
  timeoutMs: number;
}
