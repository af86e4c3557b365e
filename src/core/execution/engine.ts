import type { RelayConfig } from '../config/types.js';
import { policyKeys } from '../config/store.js';
import { EvaluationEngine, type EvaluationResult } from '../evaluation/engine.js';
import { displayValue, isFilled, Payload } from '../payload.js';
import type { AgentSpec, IncludeDocument, ResolvedStack, StackDocument } from '../stack/types.js';
import type { AgentContent, AgentOutput, ExecutionResult, NextStep } from './types.js';

const SUMMARY_PAIRS = 3;
const SUMMARY_VALUE_CHARS = 60;

const BASE_STEPS: readonly NextStep[] = [
  { action: 'Validate charter alignment', owner: 'advisor_agent', due: 'P0' },
  { action: 'Record environment snapshot', owner: 'logger', due: 'P1' },
  { action: 'Publish digest entry', owner: 'digest', due: 'P2' }
];

const NO_INCLUDES: Readonly<Record<string, IncludeDocument>> = Object.freeze({});

/** Resolved stacks carry their includes; a stack executed standalone has none. */
export type ExecutableStack = StackDocument & { includes?: ResolvedStack['includes'] };

export interface ExecutionEngineOptions {
  evaluator?: EvaluationEngine;
  clock?: () => Date;
}

/**
 * Synthesizes one advisory output per agent of a stack and scores them.
 *
 * The result depends only on the stack, the configuration, the payload and the clock.
 */
export class ExecutionEngine {
  private readonly evaluator: EvaluationEngine;
  private readonly clock: () => Date;

  constructor(
    private readonly config: RelayConfig,
    opts: ExecutionEngineOptions = {}
  ) {
    this.evaluator = opts.evaluator ?? new EvaluationEngine(config.rubric);
    this.clock = opts.clock ?? (() => new Date());
  }

  execute(stack: ExecutableStack, rawPayload: unknown): ExecutionResult {
    const timestamp = this.clock().toISOString();
    const payload = Payload.from(rawPayload);
    const outputs = Object.freeze(this.buildOutputs(stack, payload));

    return Object.freeze({
      timestamp,
      stack_id: stack.meta?.id ?? null,
      persona: stack.routing?.persona ?? 'unknown',
      role: stack.routing?.role ?? 'unknown',
      inputs: payload.toJSON(),
      outputs,
      evaluation: freezeEvaluation(this.evaluator.evaluate(outputs)),
      policy_bundle: policyKeys(this.config),
      environment: this.config.environment,
      invariants_snapshot: stack.includes ?? NO_INCLUDES
    });
  }

  buildOutputs(stack: ExecutableStack, payload: Payload): Record<string, AgentOutput> {
    const outputs: Record<string, AgentOutput> = {};
    for (const agent of stack.agents) {
      outputs[agent.name] = this.buildOutput(stack, agent, payload);
    }
    return outputs;
  }

  private buildOutput(stack: ExecutableStack, agent: AgentSpec, payload: Payload): AgentOutput {
    const spec = agent.outputs[0];
    const content: AgentContent = Object.freeze({
      persona_summary: summarizePersona(stack, payload),
      advice: craftAdvice(stack, payload),
      next_steps: Object.freeze(craftNextSteps(payload).map((step) => Object.freeze(step))),
      policy_refs: Object.freeze(policyRefs(this.config, agent.name))
    });
    return Object.freeze({
      format: spec?.format ?? 'json',
      normalize: spec?.normalize ?? true,
      content
    });
  }
}

export function summarizePersona(stack: ExecutableStack, payload: Payload): string {
  const persona = displayValue(stack.routing?.persona ?? 'persona');
  const purpose = displayValue(stack.meta?.purpose ?? 'advisory');
  if (payload.isEmpty) {
    return `${persona} operating in ${purpose}; awaiting explicit payload.`;
  }
  const keyPoints = payload
    .entries()
    .slice(0, SUMMARY_PAIRS)
    .map(([k, v]) => `${k}=${truncate(displayValue(v), SUMMARY_VALUE_CHARS)}`)
    .join(', ');
  return `${persona} operating in ${purpose}; latest payload: ${keyPoints}.`;
}

export function craftAdvice(stack: ExecutableStack, payload: Payload): string {
  const persona = displayValue(stack.routing?.persona ?? 'persona');
  const role = displayValue(stack.routing?.role ?? 'advisor');
  if (payload.isEmpty) {
    return (
      `${persona} (${role}) recommends collecting concrete context before acting. ` +
      'Start with the highest-signal question and log assumptions per CFMS invariants.'
    );
  }
  const stated = payload.stated;
  if (stated !== undefined) {
    return (
      `${persona} (${role}) confirms the goal '${displayValue(stated)}' and suggests a ` +
      'three-step advisory loop: clarify constraints, map actions to policy, ' +
      'and capture outcomes for the weekly digest.'
    );
  }
  return (
    `${persona} (${role}) has parsed the payload and proposes iterating via relay → ` +
    'executor → logger to keep the stack composable and fungible.'
  );
}

export function craftNextSteps(payload: Payload): NextStep[] {
  const steps = BASE_STEPS.map((s) => ({ ...s }));
  if (!isFilled(payload.nextAction)) return steps;
  return [
    {
      action: payload.nextAction,
      owner: payload.has('owner') ? payload.owner : 'persona',
      due: payload.has('due') ? payload.due : 'P0'
    },
    ...steps
  ];
}

export function policyRefs(config: RelayConfig, agentName: string): string[] {
  const refs = Array.from(config.policies, ([key, entry]) => `${key}:${isFilled(entry.summary) ? displayValue(entry.summary) : key}`);
  return refs.length > 0 ? refs : [`no-policies-configured-for:${agentName}`];
}

function freezeEvaluation(evaluation: EvaluationResult): EvaluationResult {
  for (const score of Object.values(evaluation.criteria)) Object.freeze(score);
  Object.freeze(evaluation.criteria);
  return Object.freeze(evaluation);
}

function truncate(text: string, max: number): string {
  // Code points, not UTF-16 units.
  const chars = Array.from(text);
  return chars.length <= max ? text : chars.slice(0, max).join('');
}
