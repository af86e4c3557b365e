import YAML from 'yaml';
import type { z } from 'zod';

import { ConfigError } from '../errors.js';
import { fileExists, isPlainObject, readText } from '../../utils/fs.js';

export interface LoadMappingOptions {
  /** When false, a missing file loads as `{}` instead of failing. */
  required: boolean;
}

/**
 * Load a YAML document that must be a mapping. An empty document is an empty mapping.
 *
 * Documents are read as YAML 1.1, so `yes`/`no`/`on`/`off` are booleans.
 */
export async function loadYamlMapping(path: string, opts: LoadMappingOptions): Promise<Record<string, unknown>> {
  const parsed = await readYaml(path, opts, false);
  if (parsed === null || parsed === undefined) return {};
  if (!isPlainObject(parsed)) {
    throw new ConfigError(path, `YAML document at ${path} must be a mapping`);
  }
  return parsed;
}

/**
 * Like `loadYamlMapping`, but every mapping in the document is a `Map` in document order with
 * its keys as strings. Keys such as `2024` keep their position.
 */
export async function loadOrderedYamlMapping(path: string, opts: LoadMappingOptions): Promise<Map<string, unknown>> {
  const parsed = await readYaml(path, opts, true);
  if (parsed === null || parsed === undefined) return new Map();
  if (!(parsed instanceof Map)) {
    throw new ConfigError(path, `YAML document at ${path} must be a mapping`);
  }
  return stringKeys(parsed);
}

async function readYaml(path: string, opts: LoadMappingOptions, mapAsMap: boolean): Promise<unknown> {
  if (!(await fileExists(path))) {
    if (!opts.required) return undefined;
    throw new ConfigError(path, `Missing YAML file: ${path}`);
  }

  const doc = YAML.parseDocument(await readText(path), { version: '1.1' });
  const problem = doc.errors[0];
  if (problem) {
    throw new ConfigError(path, `Invalid YAML in ${path}: ${problem.message}`);
  }
  try {
    return doc.toJS({ mapAsMap });
  } catch (err) {
    throw new ConfigError(path, `Invalid YAML in ${path}: ${errorMessage(err)}`);
  }
}

function stringKeys(map: Map<unknown, unknown>): Map<string, unknown> {
  const out = new Map<string, unknown>();
  for (const [key, value] of map) {
    out.set(String(key), value instanceof Map ? stringKeys(value) : value);
  }
  return out;
}

export async function loadJsonDocument(path: string, opts: LoadMappingOptions): Promise<unknown> {
  if (!(await fileExists(path))) {
    if (!opts.required) return undefined;
    throw new ConfigError(path, `Missing JSON file: ${path}`);
  }
  try {
    return JSON.parse(await readText(path));
  } catch (err) {
    throw new ConfigError(path, `Invalid JSON in ${path}: ${errorMessage(err)}`);
  }
}

/**
 * Validate a loaded document against its schema, reporting the first issues as a ConfigError.
 */
export function parseDocument<S extends z.ZodTypeAny>(schema: S, value: unknown, path: string): z.output<S> {
  const res = schema.safeParse(value);
  if (res.success) return res.data;
  const issues = res.error.issues.map((i) => `${i.path.length ? i.path.join('.') : '(root)'}: ${i.message}`);
  throw new ConfigError(path, `Malformed document ${path}: ${issues.slice(0, 3).join('; ')}`, res.error.issues);
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
