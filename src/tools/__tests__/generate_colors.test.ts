/**
 * Unit tests for generate_colors tool
 */

import { describe, it, expect } from 'vitest';
import { generateColorsHandler, generateColorsInputSchema } from '../generate_colors.js';
import { loadConfig } from '../../config.js';
import { PHI } from '../../lib/math/roots.js';

const config = loadConfig({});

describe('generate_colors tool', () => {
    describe('valid inputs', () => {
        it('should generate golden colors from index 1', () => {
            const result = generateColorsHandler({ method: 'golden', count: 3 }, config);
            expect(result).toEqual({
                ok: true,
                method: 'golden',
                label: 'golden',
                params: { saturation: 0.7, lightness: 0.5 },
                seed: 0,
                start: 1,
                count: 3,
                colors: ['#265AD9', '#8ED926', '#D926C3'],
                constant: PHI,
            });
        });

        it('should reproduce the plastic palette for seed 42', () => {
            const result = generateColorsHandler({ method: 'plastic', count: 3, seed: 42 }, config);
            expect(result).toMatchObject({ ok: true, seed: 42, colors: ['#851BE4', '#37C0C8', '#6CEC13'] });
        });

        it('should start Sobol at 0 and omit the constant', () => {
            const result = generateColorsHandler({ method: 'sobol', count: 2 }, config);
            expect(result).toMatchObject({ ok: true, start: 0, colors: ['#993333', '#36E2E2'] });
            expect(result).not.toHaveProperty('constant');
        });

        it('should honour start and params', () => {
            const result = generateColorsHandler(
                { method: 'halton', count: 2, start: 0, params: { mode: 'rgb' } },
                config
            );
            expect(result).toMatchObject({ ok: true, start: 0, colors: ['#000000', '#805533'] });
        });

        it('should fall back to the configured default seed', () => {
            const seeded = loadConfig({ CHROMASEQ_DEFAULT_SEED: '5' });
            const result = generateColorsHandler({ method: 'halton', count: 1 }, seeded);
            expect(result).toMatchObject({ ok: true, seed: 5, colors: ['#CFB347'] });
        });

        it('should label non-default parameters', () => {
            const result = generateColorsHandler({ method: 'kronecker', count: 1, params: { alpha: 2.5 } }, config);
            expect(result).toMatchObject({ ok: true, label: 'kronecker(alpha=2.5)', constant: 2.5 });
        });
    });

    describe('invalid inputs', () => {
        it('should report an unknown method', () => {
            const result = generateColorsHandler({ method: 'fibonacci', count: 1 }, config);
            expect(result).toMatchObject({ ok: false, kind: 'UnknownMethod' });
        });

        it('should report an invalid parameter', () => {
            const result = generateColorsHandler({ method: 'halton', count: 1, params: { bases: [2, 4, 5] } }, config);
            expect(result).toMatchObject({ ok: false, kind: 'InvalidParameter' });
        });

        it('should cap the count', () => {
            const small = loadConfig({ CHROMASEQ_MAX_COUNT: '10' });
            const result = generateColorsHandler({ method: 'golden', count: 11 }, small);
            expect(result).toEqual({
                ok: false,
                kind: 'InvalidParameter',
                error: 'ERROR-INVALID-PARAMETER: count 11 exceeds the limit of 10',
            });
        });

        it('should reject a non-positive count at the schema', () => {
            expect(generateColorsInputSchema.safeParse({ method: 'golden', count: 0 }).success).toBe(false);
            expect(generateColorsInputSchema.safeParse({ method: 'golden' }).success).toBe(false);
        });
    });
});
