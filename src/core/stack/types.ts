import { z } from 'zod';

import { displayValue } from '../payload.js';

// Scalar fields accept any YAML scalar and are rendered where they are used.

export const OutputSpec = z
  .object({
    format: z.unknown(),
    normalize: z.unknown()
  })
  .passthrough();

export const AgentSpec = z
  .object({
    name: z.unknown().transform((v) => (v === undefined ? 'agent' : displayValue(v))),
    // Only the first entry is honored by the execution engine.
    outputs: z.array(OutputSpec).default([])
  })
  .passthrough();

export const StackMeta = z
  .object({
    id: z.unknown(),
    purpose: z.unknown()
  })
  .passthrough();

export const StackRouting = z
  .object({
    persona: z.unknown(),
    role: z.unknown()
  })
  .passthrough();

export const StackDocumentSchema = z
  .object({
    meta: StackMeta.nullish(),
    routing: StackRouting.nullish(),
    include: z
      .array(z.string().min(1))
      .nullish()
      .transform((v) => v ?? []),
    agents: z
      .array(AgentSpec)
      .nullish()
      .transform((v) => v ?? [])
  })
  .passthrough();

export type OutputSpec = z.infer<typeof OutputSpec>;
export type AgentSpec = z.infer<typeof AgentSpec>;
export type StackRouting = z.infer<typeof StackRouting>;

/** A shared document a stack pulls in via `include`; any YAML mapping. */
export type IncludeDocument = Record<string, unknown>;

export type StackDocument = z.infer<typeof StackDocumentSchema> & {
  /** Path the stack was loaded from; its identity. */
  file: string;
};

export type ResolvedStack = StackDocument & {
  /** One entry per declared include, keyed by the include filename. */
  includes: Readonly<Record<string, IncludeDocument>>;
};
