import path from 'path';
import { InvalidArgumentError } from 'commander';
import type { HarnessConfigInput } from '@repairbench/shared';

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError(`Expected a positive integer, got "${value}".`);
  }
  return parsed;
}

export function parseNonNegativeInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError(`Expected a non-negative integer, got "${value}".`);
  }
  return parsed;
}

export function parsePositiveNumber(value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new InvalidArgumentError(`Expected a positive number, got "${value}".`);
  }
  return parsed;
}

/** Comma-separated list; repeated flags accumulate. */
export function parseList(value: string, previous: string[] = []): string[] {
  const items = value
    .split(',')
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
  return [...previous, ...items];
}

export interface RunFlags {
  corpus?: string;
  strategy?: string[];
  concurrency?: number;
  timeout?: number;
  retry?: number;
  report?: string;
  execTimeout?: number;
  cpuSeconds?: number;
  memoryMb?: number;
  maxOutputKb?: number;
  category?: string;
  difficulty?: string;
  events?: string;
}

export interface GlobalOptions {
  json?: boolean;
  config?: string;
  verbose?: boolean;
}

/**
 * Maps `run` flags onto the config shape. Unset flags stay undefined so the
 * config file and defaults show through.
 */
export function toConfigFlags(flags: RunFlags, global: GlobalOptions, cwd: string): HarnessConfigInput {
  const resolve = (p: string | undefined) => (p === undefined ? undefined : path.resolve(cwd, p));
  return {
    corpus: resolve(flags.corpus),
    run: flags.strategy,
    concurrency: flags.concurrency,
    timeoutSec: flags.timeout,
    retry: { count: flags.retry },
    limits: {
      wallClockMs: flags.execTimeout === undefined ? undefined : Math.round(flags.execTimeout * 1000),
      cpuSeconds: flags.cpuSeconds,
      memoryMb: flags.memoryMb,
      maxOutputBytes: flags.maxOutputKb === undefined ? undefined : flags.maxOutputKb * 1024,
    },
    filter: { category: flags.category, difficulty: flags.difficulty },
    report: resolve(flags.report),
    events: resolve(flags.events),
    verbose: global.verbose,
  };
}
