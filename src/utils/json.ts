/**
 * JSON text for documents that may hold `Map` mappings and `bigint` integers.
 *
 * Maps are written in insertion order, so keys such as `"7"` stay where they were inserted
 * instead of moving to the front as they would on a plain object. Bigints keep every digit.
 * Everything else is written the way `JSON.stringify` writes it.
 */
export function stringifyJson(value: unknown, indent = 0): string {
  return write(value, '', ' '.repeat(indent)) ?? 'null';
}

function write(raw: unknown, current: string, step: string): string | undefined {
  const value = toJsonValue(raw);
  if (value === null) return 'null';
  switch (typeof value) {
    case 'string':
      return JSON.stringify(value);
    case 'number':
      return Number.isFinite(value) ? String(value) : 'null';
    case 'boolean':
    case 'bigint':
      return String(value);
    case 'object':
      break;
    default:
      return undefined;
  }

  const inner = current + step;
  if (Array.isArray(value)) {
    const items = value.map((item: unknown) => write(item, inner, step) ?? 'null');
    return wrap('[', ']', items, current, inner);
  }

  const entries: Array<[string, unknown]> =
    value instanceof Map ? Array.from(value, ([k, v]): [string, unknown] => [String(k), v]) : Object.entries(value);
  const members: string[] = [];
  for (const [key, entry] of entries) {
    const text = write(entry, inner, step);
    if (text !== undefined) members.push(`${JSON.stringify(key)}:${step ? ' ' : ''}${text}`);
  }
  return wrap('{', '}', members, current, inner);
}

function toJsonValue(value: unknown): unknown {
  if (typeof value === 'object' && value !== null && 'toJSON' in value && typeof value.toJSON === 'function') {
    const converted: unknown = value.toJSON();
    return converted;
  }
  return value;
}

function wrap(open: string, close: string, parts: string[], current: string, inner: string): string {
  if (parts.length === 0) return open + close;
  if (inner === current) return open + parts.join(',') + close;
  return `${open}\n${inner}${parts.join(`,\n${inner}`)}\n${current}${close}`;
}
