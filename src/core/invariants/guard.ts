import { isPlainObject } from '../../utils/fs.js';
import { displayValue } from '../payload.js';
import type { ResolvedStack } from '../stack/types.js';

export const INVARIANTS_INCLUDE = '_cfms_invariants.yaml';
export const REQUIRED_PIPELINE_PHRASE = 'pipeline: relay → executor → logger → evaluation → digest';

export type GuardStatus = 'ok' | 'warn' | 'missing';

export interface GuardReport {
  status: GuardStatus;
  invariants?: Record<string, unknown>;
}

/**
 * Advisory check that the composed invariants declare the required pipeline ordering.
 * Never throws and never blocks execution; the report travels with the relay document.
 */
export function checkInvariants(stack: ResolvedStack): GuardReport {
  const doc = stack.includes[INVARIANTS_INCLUDE];
  const invariants = doc?.cfms_invariants;
  if (!isPlainObject(invariants) || Object.keys(invariants).length === 0) {
    return { status: 'missing' };
  }

  const joined = enforcementLines(invariants).join(' ').toLowerCase();
  const status: GuardStatus = joined.includes(REQUIRED_PIPELINE_PHRASE.toLowerCase()) ? 'ok' : 'warn';
  return { status, invariants };
}

function enforcementLines(invariants: Record<string, unknown>): string[] {
  const stackable = invariants.stackable;
  if (!isPlainObject(stackable)) return [];
  const enforcement = stackable.enforcement;
  if (!Array.isArray(enforcement)) return [];
  return enforcement.map((line) => displayValue(line));
}
