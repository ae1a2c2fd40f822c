export const name = '@repairbench/core';

export { RunOrchestrator } from './orchestrator';
export type { RunOptions, RunOrchestratorOptions, RunOutcome, Sandbox } from './orchestrator';
export { ScenarioRun } from './run/state';
export type { TransitionListener } from './run/state';
export { backoffDelay, sleep } from './run/retry';
export { ConfigLoader, DEFAULT_CONFIG_FILE } from './config/loader';
export type { ConfigOptions } from './config/loader';
