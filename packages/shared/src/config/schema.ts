import { z } from 'zod';

/**
 * Agent invoked as a child process: the request is written to stdin as JSON and
 * the response is read from stdout.
 */
export const SubprocessStrategySchema = z.object({
  type: z.literal('subprocess'),
  command: z.string().min(1),
  args: z.array(z.string()).default([]),
  /** Extra environment variables passed through to the agent process */
  envAllowlist: z.array(z.string()).default([]),
  cwd: z.string().optional(),
});

/**
 * Previously captured agent responses, one `<scenarioId>.json` per scenario.
 */
export const ReplayStrategySchema = z.object({
  type: z.literal('replay'),
  dir: z.string().min(1),
});

export const StrategyConfigSchema = z.discriminatedUnion('type', [
  SubprocessStrategySchema,
  ReplayStrategySchema,
]);

export const RetryConfigSchema = z.object({
  /** Retries for transient sandbox failures; agent outcomes are never retried */
  count: z.number().int().min(0).default(2),
  initialDelayMs: z.number().int().min(0).default(250),
  backoffFactor: z.number().min(1).default(2),
  maxDelayMs: z.number().int().min(0).default(5_000),
});

export const LimitsConfigSchema = z.object({
  wallClockMs: z.number().int().min(100).default(30_000),
  cpuSeconds: z.number().int().min(1).default(20),
  memoryMb: z.number().int().min(16).default(512),
  /** Per-stream capture cap */
  maxOutputBytes: z.number().int().min(1024).default(64 * 1024),
  /** Delay between SIGTERM and SIGKILL when a limit is breached */
  killGraceMs: z.number().int().min(0).default(1_000),
});

export const FilterConfigSchema = z.object({
  category: z.string().optional(),
  difficulty: z.string().optional(),
});

export const HarnessConfigSchema = z.object({
  corpus: z.string().optional(),
  strategies: z.record(z.string(), StrategyConfigSchema).default({}),
  /** Names from `strategies` to run; all configured strategies when empty */
  run: z.array(z.string()).default([]),
  concurrency: z.number().int().min(1).default(4),
  /** Agent deadline per submission */
  timeoutSec: z.number().positive().default(120),
  retry: RetryConfigSchema.default({}),
  limits: LimitsConfigSchema.default({}),
  filter: FilterConfigSchema.default({}),
  report: z.string().default('repairbench-report.json'),
  events: z.string().optional(),
  verbose: z.boolean().default(false),
});

export type SubprocessStrategyConfig = z.infer<typeof SubprocessStrategySchema>;
export type ReplayStrategyConfig = z.infer<typeof ReplayStrategySchema>;
export type StrategyConfig = z.infer<typeof StrategyConfigSchema>;
export type RetryConfig = z.infer<typeof RetryConfigSchema>;
export type LimitsConfig = z.infer<typeof LimitsConfigSchema>;
export type FilterConfig = z.infer<typeof FilterConfigSchema>;
export type HarnessConfig = z.infer<typeof HarnessConfigSchema>;
/** Config as written in YAML or assembled from flags, before defaults apply */
export type HarnessConfigInput = z.input<typeof HarnessConfigSchema>;
