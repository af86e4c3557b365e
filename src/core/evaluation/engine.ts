import type { RubricSchema } from '../config/types.js';
import { stringifyJson } from '../../utils/json.js';
import { defaultScorerRegistry, type ScorerRegistry } from './registry.js';

export interface CriterionScore {
  score: number;
  weight: number;
}

export interface EvaluationResult {
  criteria: Record<string, CriterionScore>;
  weighted_total: number;
}

/**
 * Scores agent outputs against a rubric. Pure: the same outputs always yield the same result.
 */
export class EvaluationEngine {
  constructor(
    private readonly rubric: Readonly<RubricSchema>,
    private readonly registry: ScorerRegistry = defaultScorerRegistry()
  ) {}

  evaluate(outputs: unknown): EvaluationResult {
    const blob = stringifyJson(outputs);
    const criteria: Record<string, CriterionScore> = {};

    // A key listed twice keeps its first position and its last weight.
    for (const criterion of this.rubric.criteria) {
      criteria[criterion.key] = {
        score: this.registry.resolve(criterion.key).score(blob),
        weight: criterion.weight
      };
    }

    return { criteria, weighted_total: weightedTotal(criteria) };
  }
}

export function weightedTotal(criteria: Record<string, CriterionScore>): number {
  let total = 0;
  for (const entry of Object.values(criteria)) total += entry.score * entry.weight;
  return total;
}
