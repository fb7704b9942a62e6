import { describe, expect, it } from 'vitest';

import { isJsonValue, parseJsonObject, toJsonValue } from '../../../src/shared/utils/json.js';

describe('toJsonValue', () => {
  it('passes JSON values through', () => {
    expect(toJsonValue({ a: [1, 'x', true, null] })).toEqual({ a: [1, 'x', true, null] });
  });

  it('encodes values JSON cannot hold', () => {
    expect(toJsonValue(undefined)).toBeNull();
    expect(toJsonValue(Number.NaN)).toBe('NaN');
    expect(toJsonValue(Number.POSITIVE_INFINITY)).toBe('Infinity');
    expect(toJsonValue(10n)).toBe('10');
    expect(toJsonValue(new Date('2024-01-02T03:04:05.000Z'))).toBe('2024-01-02T03:04:05.000Z');
    expect(toJsonValue(Buffer.from('hi'))).toBe('aGk=');
    expect(toJsonValue(function handler() {})).toBe('[Function handler]');
  });

  it('encodes errors, maps and sets', () => {
    expect(toJsonValue(new RangeError('out of range'))).toEqual({ type: 'RangeError', message: 'out of range' });
    expect(toJsonValue(new Map<string, number>([['a', 1]]))).toEqual({ a: 1 });
    expect(toJsonValue(new Set([1, 2]))).toEqual([1, 2]);
  });

  it('marks cycles without dropping shared references', () => {
    const node: Record<string, unknown> = { name: 'loop' };
    node.self = node;
    const shared = { x: 1 };

    expect(toJsonValue(node)).toEqual({ name: 'loop', self: '[Circular]' });
    expect(toJsonValue([shared, shared])).toEqual([{ x: 1 }, { x: 1 }]);
  });
});

describe('isJsonValue', () => {
  it('accepts plain JSON data', () => {
    expect(isJsonValue({ a: [1, 'x', null], b: { c: false } })).toBe(true);
  });

  it('rejects class instances and non-finite numbers', () => {
    expect(isJsonValue({ at: new Date() })).toBe(false);
    expect(isJsonValue(Number.NaN)).toBe(false);
    expect(isJsonValue(undefined)).toBe(false);
  });
});

describe('parseJsonObject', () => {
  it('parses an object', () => {
    expect(parseJsonObject('{"a":1}')).toEqual({ a: 1 });
  });

  it('rejects other JSON values', () => {
    expect(() => parseJsonObject('[1]')).toThrow(SyntaxError);
    expect(() => parseJsonObject('null')).toThrow(SyntaxError);
  });
});
