import { describe, expect, it } from 'vitest';

import { stringifyJson } from '../src/utils/json.js';

describe('stringifyJson', () => {
  it('writes plain values the way JSON.stringify does', () => {
    const value = { a: [1, 'two', null, true], b: { c: {} }, d: [], e: 1.5, f: undefined, g: Number.NaN };
    expect(stringifyJson(value)).toBe(JSON.stringify(value));
    expect(stringifyJson(value, 2)).toBe(JSON.stringify(value, null, 2));
  });

  it('writes maps in insertion order', () => {
    const map = new Map<string, unknown>([
      ['z', 1],
      ['10', 2],
      ['a', new Map([['2', 'x']])]
    ]);
    expect(stringifyJson(map)).toBe('{"z":1,"10":2,"a":{"2":"x"}}');
    expect(stringifyJson({ nested: new Map([['b', 1], ['1', 2]]) }, 2)).toBe(
      '{\n  "nested": {\n    "b": 1,\n    "1": 2\n  }\n}'
    );
  });

  it('writes bigints with every digit', () => {
    expect(stringifyJson([12345678901234567890n])).toBe('[12345678901234567890]');
  });

  it('honors toJSON and drops undefined members', () => {
    expect(stringifyJson({ at: new Date('2026-01-02T03:04:05.000Z'), skip: undefined })).toBe(
      '{"at":"2026-01-02T03:04:05.000Z"}'
    );
    expect(stringifyJson([undefined])).toBe('[null]');
    expect(stringifyJson(undefined)).toBe('null');
  });
});
