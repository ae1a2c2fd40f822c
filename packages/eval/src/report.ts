import type { RunReport } from '@repairbench/shared';
import fs from 'fs-extra';
import path from 'path';

/**
 * Writes the report as pretty-printed JSON, creating parent directories.
 */
export async function writeReport(reportPath: string, report: RunReport): Promise<string> {
  const target = path.resolve(reportPath);
  await fs.ensureDir(path.dirname(target));
  await fs.writeJson(target, report, { spaces: 2 });
  return target;
}
