export const name = '@repairbench/adapters';

export * from './types';
export * from './adapter';
export { BaseAgentAdapter } from './base-adapter';
export {
  AgentResponseSchema,
  EditSchema,
  decodeAgentOutput,
  parseAgentResponse,
  toFileEdits,
} from './protocol';
export type { AgentResponse } from './protocol';
export { SubprocessAgentAdapter } from './subprocess/adapter';
export { ReplayAgentAdapter, replayFileName } from './replay/adapter';
export { ScriptedAgentAdapter } from './fake/adapter';
export type { AgentScript, ScriptedStep } from './fake/adapter';
export { createAgentAdapter, createAgentAdapters } from './factory';
