import * as fs from 'fs/promises';
import type { HarnessEvent } from '../types/events';
import type { Logger, LoggerOptions } from './types';
import { formatWithBindings } from './consoleLogger';

interface WriteQueue {
  tail: Promise<void>;
}

/**
 * Appends structured events to a JSONL file and writes plain messages to the console.
 */
export class JsonlLogger implements Logger {
  private readonly verbose: boolean;
  // Shared with children: appends are chained so lines land in log() order.
  private readonly queue: WriteQueue;

  constructor(
    private readonly filePath: string,
    private readonly bindings: Record<string, unknown> = {},
    options: LoggerOptions & { queue?: WriteQueue } = {},
  ) {
    this.verbose = options.verbose ?? false;
    this.queue = options.queue ?? { tail: Promise.resolve() };
  }

  log(event: HarnessEvent): Promise<void> {
    const line = JSON.stringify(event) + '\n';
    this.queue.tail = this.queue.tail.then(async () => {
      try {
        await fs.appendFile(this.filePath, line, 'utf8');
      } catch (error) {
        // Losing an event line must not fail the run.
        console.error(`Failed to write to log file at ${this.filePath}`, error);
      }
    });
    return this.queue.tail;
  }

  /** Resolves once every event logged so far has been written. */
  flush(): Promise<void> {
    return this.queue.tail;
  }

  debug(message: string): void {
    if (!this.verbose) return;
    console.debug(this.withPrefix(message));
  }

  info(message: string): void {
    console.info(this.withPrefix(message));
  }

  warn(message: string): void {
    console.warn(this.withPrefix(message));
  }

  error(error: Error, message?: string): void {
    if (message) {
      console.error(this.withPrefix(message), error);
    } else {
      console.error(error);
    }
  }

  child(bindings: Record<string, unknown>): Logger {
    return new JsonlLogger(this.filePath, { ...this.bindings, ...bindings }, {
      verbose: this.verbose,
      queue: this.queue,
    });
  }

  private withPrefix(message: string): string {
    return formatWithBindings(this.bindings, message);
  }
}
