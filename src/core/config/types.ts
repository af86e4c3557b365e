import { z } from 'zod';

export const PolicyEntry = z.preprocess(
  (v) => (v instanceof Map ? Object.fromEntries(v) : v),
  z
    .object({
      summary: z.unknown()
    })
    .passthrough()
);

/** The `policies` section of an ordered catalog document; absent or empty is no policies. */
export const PolicyCatalogSection = z
  .map(z.string(), PolicyEntry)
  .nullish()
  .transform((v) => v ?? new Map<string, PolicyEntry>());

export const EnvironmentDocument = z
  .object({
    environment: z
      .record(z.string(), z.unknown())
      .nullish()
      .transform((v) => v ?? {})
  })
  .passthrough();

export const RubricCriterion = z.object({
  key: z.string().min(1),
  // Weights are used verbatim; they are not required to sum to 1.
  weight: z.number().default(0)
});

export const RubricSchema = z
  .object({
    criteria: z.array(RubricCriterion).default([])
  })
  .passthrough();

export type PolicyEntry = z.infer<typeof PolicyEntry>;
/** Policies keyed by name, in catalog order. */
export type PolicyCatalog = ReadonlyMap<string, PolicyEntry>;
export type RubricCriterion = z.infer<typeof RubricCriterion>;
export type RubricSchema = z.infer<typeof RubricSchema>;

/**
 * Everything the engines read besides the stack and the payload.
 * Built once per invocation and passed explicitly; never mutated.
 */
export interface RelayConfig {
  readonly policies: PolicyCatalog;
  readonly environment: Readonly<Record<string, unknown>>;
  readonly rubric: Readonly<RubricSchema>;
}

export interface ConfigPaths {
  policiesPath: string;
  environmentPath: string;
  rubricPath: string;
}
