import YAML from 'yaml';

import { PayloadParseError } from './errors.js';
import { isPlainObject } from '../utils/fs.js';
import { stringifyJson } from '../utils/json.js';

/** A normalized payload: top-level keys in the order the request wrote them. */
export type PayloadFields = ReadonlyMap<string, unknown>;

const MIN_SAFE = BigInt(Number.MIN_SAFE_INTEGER);
const MAX_SAFE = BigInt(Number.MAX_SAFE_INTEGER);

/**
 * Parse the raw request payload. Malformed JSON is a PayloadParseError carrying the parser's diagnostic.
 *
 * Mappings come back as `Map`s in document order. Integers beyond the safe range come back as
 * `bigint` so no digit is lost. A repeated key keeps its first position and its last value.
 */
export function parsePayload(raw: string): unknown {
  const doc = YAML.parseDocument(raw, { schema: 'json', intAsBigInt: true, uniqueKeys: false });
  const problem = doc.errors[0];
  if (problem) throw new PayloadParseError(raw, problem.message);
  if (doc.contents === null) throw new PayloadParseError(raw, 'Payload is empty');
  return doc.toJS({ mapAsMap: true, reviver: narrowSafeInteger });
}

function narrowSafeInteger(_key: unknown, value: unknown): unknown {
  if (typeof value === 'bigint' && value >= MIN_SAFE && value <= MAX_SAFE) return Number(value);
  return value;
}

/** A mapping keeps its keys; anything else is wrapped as `{ payload: value }`. */
export function normalizePayload(value: unknown): PayloadFields {
  if (value instanceof Map) return new Map(Array.from(value, ([k, v]): [string, unknown] => [String(k), v]));
  if (isPlainObject(value)) return new Map(Object.entries(value));
  return new Map([['payload', value]]);
}

/**
 * Read-only view over a normalized payload. Any key is allowed; the named accessors cover the
 * keys the engine reacts to and return undefined when the key is absent.
 */
export class Payload {
  private readonly fields: PayloadFields;

  private constructor(fields: PayloadFields) {
    this.fields = fields;
  }

  static from(value: unknown): Payload {
    return new Payload(normalizePayload(value));
  }

  get isEmpty(): boolean {
    return this.fields.size === 0;
  }

  get(key: string): unknown {
    return this.fields.get(key);
  }

  has(key: string): boolean {
    return this.fields.has(key);
  }

  /** Key/value pairs in insertion order. */
  entries(): Array<[string, unknown]> {
    return Array.from(this.fields);
  }

  get intent(): unknown {
    return this.get('intent');
  }
  get goal(): unknown {
    return this.get('goal');
  }
  get nextAction(): unknown {
    return this.get('next_action');
  }
  get owner(): unknown {
    return this.get('owner');
  }
  get due(): unknown {
    return this.get('due');
  }

  /** First of `intent`, `goal` that carries a value (empty strings, zero, empty collections do not). */
  get stated(): unknown {
    if (isFilled(this.intent)) return this.intent;
    if (isFilled(this.goal)) return this.goal;
    return undefined;
  }

  toJSON(): PayloadFields {
    return this.fields;
  }
}

/**
 * Whether a payload value counts as provided: not null/undefined/false/0/'' and not an empty array or mapping.
 */
export function isFilled(value: unknown): boolean {
  if (value === null || value === undefined || value === false) return false;
  if (value === 0 || value === 0n || value === '' || Number.isNaN(value)) return false;
  if (Array.isArray(value)) return value.length > 0;
  if (value instanceof Map) return value.size > 0;
  if (isPlainObject(value)) return Object.keys(value).length > 0;
  return true;
}

/** Text form of a payload value: strings verbatim, everything else as JSON. */
export function displayValue(value: unknown): string {
  if (typeof value === 'string') return value;
  if (value === undefined) return 'undefined';
  return stringifyJson(value);
}
