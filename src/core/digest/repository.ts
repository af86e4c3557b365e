import { join } from 'node:path';

import { fileExists, isDirectory, isPlainObject, listSorted, readJson } from '../../utils/fs.js';
import { silentLogger, type Logger } from '../../utils/logger.js';
import { parseRunStamp, runStampTimestamp } from '../../utils/run-stamp.js';
import { runPaths, vaultRunsDir } from '../../workspace/layout.js';
import { RelayRecordSchema, type RunRecord } from './types.js';

/**
 * Source of recorded runs for the digest.
 */
export interface RunRepository {
  /** Runs stamped at or after `cutoff`, oldest first. */
  listRunsSince(cutoff: Date): Promise<RunRecord[]>;
}

/**
 * Reads `<vault>/runs/<YYYY-MM-DD>/<HHMMSS>/`. Directories that do not follow the naming
 * convention are ignored, as are runs without a non-empty `relay.json`.
 */
export class VaultRunRepository implements RunRepository {
  private readonly logger: Logger;

  constructor(
    private readonly vaultDir: string,
    opts: { logger?: Logger } = {}
  ) {
    this.logger = opts.logger ?? silentLogger;
  }

  async listRunsSince(cutoff: Date): Promise<RunRecord[]> {
    const runsRoot = vaultRunsDir(this.vaultDir);
    const runs: RunRecord[] = [];

    for (const dateName of await listSorted(runsRoot)) {
      const dateDir = join(runsRoot, dateName);
      if (!(await isDirectory(dateDir))) continue;

      for (const timeName of await listSorted(dateDir)) {
        const runDir = join(dateDir, timeName);
        if (!(await isDirectory(runDir))) continue;

        const at = parseRunStamp(dateName, timeName);
        if (!at || at < cutoff) continue;

        const record = await this.readRun(runDir);
        if (!record) continue;
        runs.push({ ...record, timestamp: runStampTimestamp({ date: dateName, time: timeName }) });
      }
    }
    return runs;
  }

  private async readRun(runDir: string): Promise<Omit<RunRecord, 'timestamp'> | null> {
    const paths = runPaths(runDir);
    const relayRaw = await this.readOptionalJson(paths.relayPath);
    if (!isPlainObject(relayRaw) || Object.keys(relayRaw).length === 0) return null;

    const relay = RelayRecordSchema.safeParse(relayRaw);
    if (!relay.success) {
      this.logger.warn('skipping run with unreadable relay.json', { runDir, issues: relay.error.issues.length });
      return null;
    }

    const evaluationRaw = await this.readOptionalJson(paths.evaluationPath);
    return {
      runDir,
      relay: relay.data,
      evaluation: isPlainObject(evaluationRaw) ? evaluationRaw : {}
    };
  }

  private async readOptionalJson(path: string): Promise<unknown> {
    if (!(await fileExists(path))) return undefined;
    try {
      return await readJson(path);
    } catch (err) {
      // Partly written runs are skipped.
      this.logger.warn('skipping unparsable JSON', { path, error: err instanceof Error ? err.message : String(err) });
      return undefined;
    }
  }
}

