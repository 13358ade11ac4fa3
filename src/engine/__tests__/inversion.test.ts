/**
 * Unit tests for color inversion and the sequence-level properties it relies on
 */

import { describe, it, expect } from 'vitest';
import {
    invertColor,
    invertColorPartitioned,
    invertHex,
    mergeResults,
    partitionRange,
    searchRange,
    type InversionResult,
} from '../inversion.js';
import { generateColor } from '../sequences.js';
import { createMethod, defaultMethod, type MethodKind } from '../method.js';
import { colorDistance, hexToRgb, rgbToHex } from '../../lib/color/convert.js';
import { SequenceError } from '../../lib/errors.js';

describe('invertHex', () => {
    const plastic = defaultMethod('plastic');

    it('should recover index 1 from #851BE4 with seed 42', () => {
        expect(rgbToHex(generateColor(plastic, 1, 42))).toBe('#851BE4');
        const result = invertHex('#851BE4', plastic, 42, { maxSearch: 10000 });
        expect(result.found).toBe(true);
        expect(result.index).toBe(1);
        expect(result.distance).toBeCloseTo(0.0027318629551329526, 12);
    });

    it('should recover index 69 from #D4832B with seed 42', () => {
        expect(rgbToHex(generateColor(plastic, 69, 42))).toBe('#D4832B');
        const result = invertHex('#D4832B', plastic, 42, { maxSearch: 10000 });
        expect(result.found).toBe(true);
        expect(result.index).toBe(69);
    });

    it('should round-trip every quantized index in [1, 1000] with seed 42', () => {
        for (let n = 1; n <= 1000; n++) {
            const hex = rgbToHex(generateColor(plastic, n, 42));
            expect(invertHex(hex, plastic, 42, { maxSearch: 10000 }).index).toBe(n);
        }
    });

    it('should let a later neighbour win under the nearest strategy', () => {
        expect(rgbToHex(generateColor(plastic, 769, 42))).toBe('#33CCCC');
        expect(invertHex('#33CCCC', plastic, 42).index).toBe(769);
        expect(invertHex('#33CCCC', plastic, 42, { strategy: 'nearest' }).index).toBe(8508);
    });

    it('should accept lowercase hex without the hash', () => {
        expect(invertHex('851be4', plastic, 42).index).toBe(1);
    });

    it('should report a miss as data, not an exception', () => {
        const result = invertHex('#000000', plastic, 42, { maxSearch: 10000 });
        expect(result).toEqual({ found: false, index: null, distance: null });
    });

    it('should reject malformed colors before searching', () => {
        expect(() => invertHex('#851BE', plastic, 42)).toThrow(SequenceError);
        expect(() => invertHex('#851BEZ', plastic, 42)).toThrow(/ERROR-MALFORMED-COLOR/);
    });

    it('should keep hex quantization idempotent', () => {
        expect(rgbToHex(hexToRgb('#851BE4'))).toBe('#851BE4');
    });
});

describe('invertColor', () => {
    const golden = defaultMethod('golden');

    it.each<MethodKind>(['golden', 'plastic', 'halton', 'kronecker'])(
        'should round-trip every index in [1, 1000] for %s',
        (kind) => {
            const method = defaultMethod(kind);
            for (const seed of [0, 7]) {
                for (let n = 1; n <= 1000; n++) {
                    const result = invertColor(generateColor(method, n, seed), method, seed, {
                        maxSearch: 10000,
                        tolerance: 0.01,
                    });
                    expect(result.index).toBe(n);
                }
            }
        }
    );

    it('should round-trip the multi-dimensional methods', () => {
        for (const kind of ['r_sequence', 'sobol'] as const) {
            const method = defaultMethod(kind);
            for (const n of [1, 17, 233, 1000, 4321]) {
                expect(invertColor(generateColor(method, n, 7), method, 7).index).toBe(n);
            }
        }
    });

    it('should include index 0 in the Sobol search', () => {
        const sobol = defaultMethod('sobol');
        expect(invertColor(generateColor(sobol, 0), sobol, 0)).toEqual({ found: true, index: 0, distance: 0 });
    });

    it('should let the first strategy return an earlier neighbour', () => {
        const target = generateColor(golden, 500);
        expect(invertColor(target, golden, 0, { strategy: 'first' }).index).toBe(123);
        expect(invertColor(target, golden, 0, { strategy: 'nearest' })).toEqual({
            found: true,
            index: 500,
            distance: 0,
        });
    });

    it('should not scan past maxSearch', () => {
        const target = generateColor(golden, 50);
        expect(invertColor(target, golden, 0, { maxSearch: 49 }).found).toBe(false);
        expect(invertColor(target, golden, 0, { maxSearch: 50 }).index).toBe(50);
    });

    it('should return the start index for the first strategy under a wide tolerance', () => {
        const result = invertColor(generateColor(golden, 240), golden, 0, {
            maxSearch: 240,
            tolerance: Math.sqrt(3),
            strategy: 'first',
        });
        expect(result.index).toBe(1);
    });

    it('should reject tolerances outside (0, √3]', () => {
        const target = generateColor(golden, 1);
        expect(() => invertColor(target, golden, 0, { tolerance: 0 })).toThrow(SequenceError);
        expect(() => invertColor(target, golden, 0, { tolerance: 2 })).toThrow(SequenceError);
        expect(() => invertColor(target, golden, 0, { tolerance: Math.sqrt(3) })).not.toThrow();
    });

    it('should reject a negative maxSearch', () => {
        expect(() => invertColor(generateColor(golden, 1), golden, 0, { maxSearch: -1 })).toThrow(SequenceError);
    });
});

describe('partitioned search', () => {
    it('should split a range into contiguous ascending parts', () => {
        expect(partitionRange({ from: 1, to: 10 }, 3)).toEqual([
            { from: 1, to: 4 },
            { from: 5, to: 8 },
            { from: 9, to: 10 },
        ]);
        expect(partitionRange({ from: 0, to: 2 }, 5)).toEqual([
            { from: 0, to: 0 },
            { from: 1, to: 1 },
            { from: 2, to: 2 },
        ]);
        expect(partitionRange({ from: 5, to: 4 }, 2)).toEqual([]);
    });

    it('should reject a non-positive partition count', () => {
        expect(() => partitionRange({ from: 1, to: 10 }, 0)).toThrow(SequenceError);
    });

    it('should match the single scan for both strategies', () => {
        const golden = defaultMethod('golden');
        const target = generateColor(golden, 500);
        for (const strategy of ['nearest', 'first'] as const) {
            for (const parts of [1, 3, 8]) {
                expect(invertColorPartitioned(target, golden, 0, parts, { strategy })).toEqual(
                    invertColor(target, golden, 0, { strategy })
                );
            }
        }
    });

    it('should merge by distance for nearest and by index for first', () => {
        const results: InversionResult[] = [
            { found: false, index: null, distance: null },
            { found: true, index: 40, distance: 0.004 },
            { found: true, index: 12, distance: 0.006 },
            { found: true, index: 90, distance: 0.004 },
        ];
        expect(mergeResults(results, 'nearest')).toEqual({ found: true, index: 40, distance: 0.004 });
        expect(mergeResults(results, 'first')).toEqual({ found: true, index: 12, distance: 0.006 });
        expect(mergeResults([], 'nearest').found).toBe(false);
    });

    it('should treat an empty range as a miss', () => {
        const golden = defaultMethod('golden');
        expect(searchRange(generateColor(golden, 1), golden, 0, { from: 10, to: 9 }).found).toBe(false);
    });
});

describe('sequence properties', () => {
    it('should spread the first 100 plastic colors widely', () => {
        const plastic = defaultMethod('plastic');
        const colors = Array.from({ length: 100 }, (_, i) => generateColor(plastic, i + 1, 0));
        let total = 0;
        let pairs = 0;
        for (let i = 0; i < colors.length; i++) {
            for (let j = i + 1; j < colors.length; j++) {
                total += colorDistance(colors[i], colors[j]);
                pairs++;
            }
        }
        expect(total / pairs).toBeGreaterThan(0.3);
    });

    it('should produce fewer than 10 hex collisions over 1000 plastic colors', () => {
        const plastic = defaultMethod('plastic');
        const seen = new Set<string>();
        let collisions = 0;
        for (let n = 1; n <= 1000; n++) {
            const hex = rgbToHex(generateColor(plastic, n, 42));
            if (seen.has(hex)) {
                collisions++;
            }
            seen.add(hex);
        }
        expect(collisions).toBeLessThan(10);
    });

    it('should separate seeds for the digit-reflection methods', () => {
        for (const kind of ['halton', 'sobol'] as const) {
            const method = defaultMethod(kind);
            expect(colorDistance(generateColor(method, 10, 1), generateColor(method, 10, 2))).toBeGreaterThan(0);
        }
    });

    it('should separate methods built on different constants', () => {
        const a = createMethod('kronecker', { alpha: Math.SQRT2 });
        const b = createMethod('kronecker', { alpha: Math.sqrt(3) });
        expect(colorDistance(generateColor(a, 1), generateColor(b, 1))).toBeGreaterThan(0);
    });
});
