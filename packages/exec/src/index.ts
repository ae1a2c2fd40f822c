export { runProcess, killProcessTree, getSafeEnv } from './runner/runner';
export type {
  ProcessLimits,
  ProcessRequest,
  ProcessRunOptions,
  ProcessRunResult,
} from './runner/runner';
export { BoundedOutput } from './runner/output';
export { SandboxExecutor } from './sandbox/executor';
export type { SandboxExecutorOptions, SandboxRunOptions } from './sandbox/executor';
export { WORKSPACE_PREFIX, isTransientErrno } from './sandbox/workspace';
