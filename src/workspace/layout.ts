import { mkdir } from 'node:fs/promises';
import { join } from 'node:path';

import { formatRunStamp, runStampLabel, type RunStampParts } from '../utils/run-stamp.js';

export interface RunPaths {
  runDir: string;
  outputsDir: string;
  relayPath: string;
  evaluationPath: string;
  loggerPath: string;
}

export interface NewRun extends RunPaths {
  vaultDir: string;
  stamp: RunStampParts;
  /** `YYYY-MM-DD/HHMMSS`, also used as the vault commit message suffix. */
  label: string;
}

export function vaultRunsDir(vaultDir: string): string {
  return join(vaultDir, 'runs');
}

export function defaultDigestPath(vaultDir: string): string {
  return join(vaultDir, 'digest.json');
}

/**
 * Paths of the files a run directory holds. Nothing is created.
 */
export function runPaths(runDir: string): RunPaths {
  return {
    runDir,
    outputsDir: join(runDir, 'outputs'),
    relayPath: join(runDir, 'relay.json'),
    evaluationPath: join(runDir, 'evaluation.json'),
    loggerPath: join(runDir, 'logger.json')
  };
}

export function agentOutputPath(runDir: string, agentName: string): string {
  const safe = agentName.replaceAll(/[^a-zA-Z0-9_.-]/g, '_');
  return join(runDir, 'outputs', `${safe}.json`);
}

/**
 * Create `<vault>/runs/<YYYY-MM-DD>/<HHMMSS>/outputs/` for a run starting at `now` (UTC).
 */
export async function initRun(vaultDir: string, now: Date = new Date()): Promise<NewRun> {
  const stamp = formatRunStamp(now);
  const runDir = join(vaultRunsDir(vaultDir), stamp.date, stamp.time);
  const paths = runPaths(runDir);
  await mkdir(paths.outputsDir, { recursive: true });
  return { ...paths, vaultDir, stamp, label: runStampLabel(stamp) };
}
