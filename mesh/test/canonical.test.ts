
import { describe, it, expect } from 'vitest';
import { canonicalJson, sortKeys } from '../canonical';
import { sha224Hex } from '../hash';
import { createQuery, queryHash, serializeQuery } from '../query';

describe('Canonicalization', () => {
    it('sorts keys recursively', () => {
        expect(canonicalJson({ b: 1, a: { d: [2, 1], c: 'x' } })).toBe('{"a":{"c":"x","d":[2,1]},"b":1}');
    });

    it('drops undefined properties and nulls undefined array items', () => {
        expect(canonicalJson({ a: 1, b: undefined, c: [undefined, 2] })).toBe('{"a":1,"c":[null,2]}');
    });

    it('rejects NaN and Infinity', () => {
        expect(() => sortKeys({ value: NaN })).toThrow(/non-finite/);
        expect(() => sortKeys({ value: -Infinity })).toThrow(/non-finite/);
    });

    it('rejects functions and bigints', () => {
        expect(() => sortKeys({ f: () => 1 })).toThrow(/function/);
        expect(() => sortKeys({ n: 1n })).toThrow(/bigint/);
    });

    it('normalizes -0 to 0', () => {
        expect(sortKeys({ value: -0, list: [-0] })).toEqual({ list: [0], value: 0 });
    });

    it('serializes dates as ISO strings', () => {
        expect(canonicalJson({ t: new Date(Date.UTC(2020, 0, 1)) })).toBe('{"t":"2020-01-01T00:00:00.000Z"}');
    });

    it('serializes independently of insertion order', () => {
        expect(canonicalJson({ x: 1, y: [1, 2], z: { q: true } })).toBe(
            canonicalJson({ z: { q: true }, y: [1, 2], x: 1 })
        );
    });
});

describe('Hashing', () => {
    it('computes SHA-224 test vectors', () => {
        expect(sha224Hex('')).toBe('d14a028c2a3a2bc9476102bb288234c415a2b01f828ea62ac5b3e42f');
        expect(sha224Hex('abc')).toBe('23097d223405d8228642a477bda255b32aadbce4bda0b3f7e36c9da7');
    });
});

describe('Queries', () => {
    it('applies defaults and serializes canonically', () => {
        const q = createQuery({ datasource: 'wave', timefilter: { times: ['2020-01-01T00:00:00Z', null] } });
        expect(serializeQuery(q)).toBe(
            '{"datasource":"wave","parameters":{},"request":"data","timefilter":{"times":["2020-01-01T00:00:00Z",null],"type":"range"}}'
        );
    });

    it('converts Date bounds to ISO strings', () => {
        const q = createQuery({ datasource: 'wave', timefilter: { times: [new Date(Date.UTC(2021, 5, 1)), null] } });
        expect(q.timefilter?.times[0]).toBe('2021-06-01T00:00:00.000Z');
    });

    it('hashes equal queries identically regardless of key order', () => {
        const a = createQuery({ datasource: 'wave', variables: ['hs'], parameters: { a: 1, b: 2 } });
        const b = createQuery({ parameters: { b: 2, a: 1 }, variables: ['hs'], datasource: 'wave' });
        expect(queryHash(a)).toBe(queryHash(b));
        expect(queryHash(a)).toMatch(/^[0-9a-f]{56}$/);
    });

    it('distinguishes different queries', () => {
        const a = createQuery({ datasource: 'wave', variables: ['hs'] });
        const b = createQuery({ datasource: 'wave', variables: ['tp'] });
        expect(queryHash(a)).not.toBe(queryHash(b));
    });

    it('freezes the result', () => {
        const q = createQuery({ datasource: 'wave', variables: ['hs'] });
        expect(Object.isFrozen(q)).toBe(true);
        expect(Object.isFrozen(q.variables)).toBe(true);
    });

    it('rejects invalid queries with the failing path', () => {
        expect(() => createQuery({ datasource: '' })).toThrow(/^Invalid query: datasource/);
        expect(() => createQuery({ datasource: 'x', geofilter: { type: 'radius', geom: [0, 0, -1] } })).toThrow(
            /Invalid query: geofilter\.geom\.2/
        );
    });
});
