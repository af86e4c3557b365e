import { isPlainObject } from '../../utils/fs.js';
import type { RunRepository } from './repository.js';
import type { Digest, RunRecord } from './types.js';

const DAY_MS = 24 * 60 * 60 * 1000;

export interface DigestOptions {
  now?: Date;
  windowDays: number;
}

export function digestCutoff(now: Date, windowDays: number): Date {
  return new Date(now.getTime() - windowDays * DAY_MS);
}

/**
 * Mean score per criterion across runs, rounded to 3 decimals. A criterion entry is either
 * `{ score, weight }` or a bare number; entries without a numeric score are ignored.
 */
export function aggregateScores(runs: RunRecord[]): Record<string, number> {
  const totals = new Map<string, { sum: number; count: number }>();

  for (const run of runs) {
    const criteria = run.relay.result?.evaluation?.criteria ?? {};
    for (const [key, entry] of Object.entries(criteria)) {
      const score = readScore(entry);
      if (score === null) continue;
      const t = totals.get(key) ?? { sum: 0, count: 0 };
      t.sum += score;
      t.count += 1;
      totals.set(key, t);
    }
  }

  const averages: Record<string, number> = {};
  for (const [key, t] of totals) {
    averages[key] = round3(t.sum / t.count);
  }
  return averages;
}

export function buildDigest(runs: RunRecord[], opts: DigestOptions): Digest {
  const now = opts.now ?? new Date();
  return {
    generated_at: now.toISOString(),
    window_days: opts.windowDays,
    runs_considered: runs.length,
    persona_roles: runs.map((run) => ({
      persona: run.relay.persona ?? null,
      role: run.relay.role ?? null
    })),
    average_scores: aggregateScores(runs),
    recent_runs: runs.map((run) => ({
      timestamp: run.timestamp,
      stack_id: run.relay.result?.stack_id ?? null,
      weighted_total: run.relay.result?.evaluation?.weighted_total ?? null
    }))
  };
}

/**
 * Digest of every run in the trailing `windowDays` window ending at `now`.
 */
export async function generateDigest(repository: RunRepository, opts: DigestOptions): Promise<Digest> {
  const now = opts.now ?? new Date();
  const runs = await repository.listRunsSince(digestCutoff(now, opts.windowDays));
  return buildDigest(runs, { ...opts, now });
}

function readScore(entry: unknown): number | null {
  const raw = isPlainObject(entry) ? entry.score : entry;
  return typeof raw === 'number' && Number.isFinite(raw) ? raw : null;
}

function round3(n: number): number {
  return Math.round(n * 1000) / 1000;
}
