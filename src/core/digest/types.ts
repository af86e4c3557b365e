import { z } from 'zod';

/**
 * The parts of a recorded `relay.json` the digest reads. Everything is optional: runs
 * written by older or hand-edited relays still count.
 */
export const RelayRecordSchema = z
  .object({
    persona: z.string().nullish(),
    role: z.string().nullish(),
    result: z
      .object({
        stack_id: z.unknown(),
        evaluation: z
          .object({
            criteria: z.record(z.string(), z.unknown()).nullish(),
            weighted_total: z.number().nullish()
          })
          .passthrough()
          .nullish()
      })
      .passthrough()
      .nullish()
  })
  .passthrough();

export type RelayRecord = z.infer<typeof RelayRecordSchema>;

export interface RunRecord {
  /** `YYYY-MM-DDTHHMMSSZ`, derived from the run directory path. */
  timestamp: string;
  runDir: string;
  relay: RelayRecord;
  /** Rubric snapshot stored with the run; `{}` when absent. */
  evaluation: Record<string, unknown>;
}

export interface PersonaRole {
  persona: string | null;
  role: string | null;
}

export interface RecentRun {
  timestamp: string;
  stack_id: unknown;
  weighted_total: number | null;
}

export interface Digest {
  generated_at: string;
  window_days: number;
  runs_considered: number;
  persona_roles: PersonaRole[];
  average_scores: Record<string, number>;
  recent_runs: RecentRun[];
}
