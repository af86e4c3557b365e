/**
 * Scores one rubric criterion from the serialized agent outputs.
 */
export interface CriterionScorer {
  score(outputsBlob: string): number;
}

/** `hit` when the blob contains `needle`, `miss` otherwise. */
export function substringScorer(needle: string, hit: number, miss: number): CriterionScorer {
  return {
    score: (blob) => (blob.includes(needle) ? hit : miss)
  };
}

export function constantScorer(value: number): CriterionScorer {
  return { score: () => value };
}

export const FALLBACK_SCORE = 0.5;

/**
 * Criterion key → scorer, with an explicit fallback for keys nobody registered.
 */
export class ScorerRegistry {
  private readonly scorers = new Map<string, CriterionScorer>();

  constructor(private readonly fallback: CriterionScorer = constantScorer(FALLBACK_SCORE)) {}

  register(key: string, scorer: CriterionScorer): this {
    this.scorers.set(key, scorer);
    return this;
  }

  has(key: string): boolean {
    return this.scorers.has(key);
  }

  resolve(key: string): CriterionScorer {
    return this.scorers.get(key) ?? this.fallback;
  }

  keys(): string[] {
    return [...this.scorers.keys()];
  }
}

export function defaultScorerRegistry(): ScorerRegistry {
  return new ScorerRegistry()
    .register('charter_alignment', substringScorer('policy', 0.9, 0.75))
    .register('clarity', substringScorer('persona_summary', 0.85, 0.7))
    .register('actionability', substringScorer('next_steps', 0.88, 0.6))
    .register('compliance', substringScorer('normalize', 0.92, 0.65));
}
