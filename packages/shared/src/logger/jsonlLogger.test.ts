import { describe, it, expect, afterEach, vi } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import { join } from 'node:path';
import { JsonlLogger } from './jsonlLogger';
import type { VerdictRecorded } from '../types/events';

function verdictEvent(scenarioId: string, timestamp: string): VerdictRecorded {
  return {
    schemaVersion: 1,
    timestamp,
    runId: 'run-1',
    type: 'VerdictRecorded',
    payload: {
      scenarioId,
      strategy: 'react',
      outcome: 'Pass',
      localizationCorrect: true,
      warnings: 0,
    },
  };
}

describe('JsonlLogger', () => {
  let tmpDir: string;

  afterEach(async () => {
    vi.restoreAllMocks();
    if (tmpDir) {
      await fs.rm(tmpDir, { recursive: true, force: true });
    }
  });

  it('logs events to file in JSONL format', async () => {
    tmpDir = await fs.mkdtemp(join(os.tmpdir(), 'rb-logger-test-'));
    const logPath = join(tmpDir, 'events.jsonl');
    const logger = new JsonlLogger(logPath);

    const event = verdictEvent('ne01', '2026-01-01T00:00:00Z');
    await logger.log(event);

    const content = await fs.readFile(logPath, 'utf8');
    expect(content.trim()).toBe(JSON.stringify(event));
  });

  it('keeps log order across child loggers', async () => {
    tmpDir = await fs.mkdtemp(join(os.tmpdir(), 'rb-logger-test-'));
    const logPath = join(tmpDir, 'events.jsonl');
    const logger = new JsonlLogger(logPath);
    const child = logger.child({ strategy: 'react' });

    void logger.log(verdictEvent('a', '2026-01-01T00:00:00Z'));
    void child.log(verdictEvent('b', '2026-01-01T00:00:01Z'));
    void logger.log(verdictEvent('c', '2026-01-01T00:00:02Z'));
    await logger.flush();

    const lines = (await fs.readFile(logPath, 'utf8')).trim().split('\n');
    expect(lines.map((l) => JSON.parse(l).payload.scenarioId)).toEqual(['a', 'b', 'c']);
  });

  it('reports write failures without throwing', async () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const logger = new JsonlLogger('/nonexistent-dir/sub/events.jsonl');

    await expect(logger.log(verdictEvent('x', '2026-01-01T00:00:00Z'))).resolves.toBeUndefined();
    expect(errorSpy).toHaveBeenCalledWith(
      'Failed to write to log file at /nonexistent-dir/sub/events.jsonl',
      expect.any(Error),
    );
  });

  it('prefixes console messages with bindings', () => {
    const infoSpy = vi.spyOn(console, 'info').mockImplementation(() => {});
    const logger = new JsonlLogger('/tmp/unused.jsonl', { runId: 'r1' });
    logger.child({ scenario: 's1' }).info('done');
    expect(infoSpy).toHaveBeenCalledWith('[runId=r1 scenario=s1] done');
  });
});
