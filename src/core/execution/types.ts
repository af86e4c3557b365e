import type { EvaluationResult } from '../evaluation/engine.js';
import type { PayloadFields } from '../payload.js';
import type { IncludeDocument } from '../stack/types.js';

export interface NextStep {
  readonly action: unknown;
  readonly owner: unknown;
  readonly due: unknown;
}

export interface AgentContent {
  readonly persona_summary: string;
  readonly advice: string;
  readonly next_steps: readonly NextStep[];
  readonly policy_refs: readonly string[];
}

/** `format` and `normalize` are taken from the stack as written; they default to `json` and `true`. */
export interface AgentOutput {
  readonly format: unknown;
  readonly normalize: unknown;
  readonly content: AgentContent;
}

/**
 * The envelope one invocation produces. Field names are the on-disk JSON names. The envelope,
 * its outputs and its evaluation are frozen; `inputs` is a read-only view of the payload.
 */
export interface ExecutionResult {
  readonly timestamp: string;
  readonly stack_id: unknown;
  readonly persona: unknown;
  readonly role: unknown;
  readonly inputs: PayloadFields;
  readonly outputs: Readonly<Record<string, AgentOutput>>;
  readonly evaluation: EvaluationResult;
  readonly policy_bundle: readonly string[];
  readonly environment: Readonly<Record<string, unknown>>;
  readonly invariants_snapshot: Readonly<Record<string, IncludeDocument>>;
}
