import { describe, expect, it } from 'vitest';
import { IdentityError } from '../../src/exceptions.js';
import { canonicalJson, fingerprint } from '../../src/identity/canonical-json.js';

describe('canonicalJson', () => {
  it('sorts object keys at every depth', () => {
    expect(canonicalJson({ b: 1, a: { d: [3, { z: 1, y: 2 }], c: 'x' } })).toBe(
      '{"a":{"c":"x","d":[3,{"y":2,"z":1}]},"b":1}',
    );
  });

  it('drops undefined members but keeps null', () => {
    expect(canonicalJson({ a: undefined, b: null })).toBe('{"b":null}');
  });

  it('encodes undefined array items as null', () => {
    expect(canonicalJson([1, undefined, 'x'])).toBe('[1,null,"x"]');
  });

  it('keeps array order significant', () => {
    expect(canonicalJson([1, 2])).not.toBe(canonicalJson([2, 1]));
  });

  it('escapes strings the way JSON does', () => {
    expect(canonicalJson({ 'k"ey': 'line\nbreak' })).toBe('{"k\\"ey":"line\\nbreak"}');
  });

  it('rejects non-finite numbers', () => {
    expect(() => canonicalJson({ a: Number.NaN })).toThrow(IdentityError);
    expect(() => canonicalJson([Number.POSITIVE_INFINITY])).toThrow('Non-finite number at $[0]');
  });

  it('rejects class instances and functions', () => {
    expect(() => canonicalJson({ when: new Date(0) })).toThrow('Unsupported object at $.when');
    expect(() => canonicalJson({ fn: () => 1 })).toThrow('Unsupported function at $.fn');
  });

  it('rejects a bare undefined', () => {
    expect(() => canonicalJson(undefined)).toThrow(IdentityError);
  });
});

describe('fingerprint', () => {
  it('is independent of key insertion order', () => {
    const forward = { engine: 'kraken', model: { reference: 'r', resolved: 's' }, size: '!3000,3000' };
    const backward = { size: '!3000,3000', model: { resolved: 's', reference: 'r' }, engine: 'kraken' };
    expect(fingerprint(forward)).toBe(fingerprint(backward));
  });

  it('changes when any value changes', () => {
    expect(fingerprint({ a: 1 })).not.toBe(fingerprint({ a: 2 }));
  });
});
