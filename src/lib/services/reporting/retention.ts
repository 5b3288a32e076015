import fs from 'fs/promises';
import path from 'path';
import { REPORT_PREFIX } from './report-writer';

const DAY_MS = 24 * 60 * 60 * 1000;

export interface RetentionResult {
  deleted: string[];
  failed: { file: string; error: unknown }[];
}

/**
 * Delete reports in `reportDir` whose modification time is more than
 * `retentionDays` before `now`. Only `validation_report_*` files are touched.
 * `retentionDays` of 0 keeps everything.
 */
export async function applyRetention(
  reportDir: string,
  retentionDays: number,
  now: Date = new Date()
): Promise<RetentionResult> {
  const result: RetentionResult = { deleted: [], failed: [] };
  if (retentionDays <= 0) return result;

  let entries: string[];
  try {
    entries = await fs.readdir(reportDir);
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return result;
    }
    throw error;
  }

  const cutoff = now.getTime() - retentionDays * DAY_MS;

  for (const file of entries.filter((name) => name.startsWith(REPORT_PREFIX)).sort()) {
    const filePath = path.join(reportDir, file);
    try {
      const stats = await fs.stat(filePath);
      if (!stats.isFile() || stats.mtimeMs >= cutoff) continue;

      await fs.unlink(filePath);
      result.deleted.push(file);
    } catch (error) {
      result.failed.push({ file, error });
    }
  }

  return result;
}
