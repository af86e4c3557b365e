import { join } from 'node:path';

import { loadYamlMapping, parseDocument } from '../config/documents.js';
import { StackDocumentSchema, type IncludeDocument, type ResolvedStack, type StackDocument } from './types.js';

/**
 * Load one stack document. A missing file, non-mapping content, or an `include` or `agents`
 * section that is not a list is a ConfigError. Scalar fields take any value.
 */
export async function loadStack(path: string): Promise<StackDocument> {
  const raw = await loadYamlMapping(path, { required: true });
  const doc = parseDocument(StackDocumentSchema, raw, path);
  return { ...doc, file: path };
}

/**
 * Attach every declared include, loaded from `baseDir/<name>`.
 *
 * Resolution is single-level: includes of includes are not followed. A missing include fails
 * the whole stack rather than producing a partial bundle.
 */
export async function resolveIncludes(stack: StackDocument, baseDir: string): Promise<ResolvedStack> {
  const includes: Record<string, IncludeDocument> = {};
  for (const name of stack.include) {
    includes[name] = await loadYamlMapping(join(baseDir, name), { required: true });
  }
  return { ...stack, includes: Object.freeze(includes) };
}

export async function loadResolvedStack(path: string, baseDir: string): Promise<ResolvedStack> {
  return await resolveIncludes(await loadStack(path), baseDir);
}
