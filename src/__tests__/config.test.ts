/**
 * Unit tests for environment configuration
 */

import { describe, it, expect } from 'vitest';
import { loadConfig } from '../config.js';

describe('loadConfig', () => {
    it('should use defaults when nothing is set', () => {
        expect(loadConfig({})).toEqual({
            defaultSeed: 0,
            maxSearch: 10000,
            tolerance: 0.01,
            maxCount: 10000,
            searchLimit: 1000000,
        });
    });

    it('should read and coerce CHROMASEQ_ variables', () => {
        const config = loadConfig({
            CHROMASEQ_DEFAULT_SEED: '42',
            CHROMASEQ_MAX_SEARCH: '500',
            CHROMASEQ_TOLERANCE: '0.05',
            CHROMASEQ_MAX_COUNT: '64',
            CHROMASEQ_SEARCH_LIMIT: '2000',
        });
        expect(config).toEqual({
            defaultSeed: 42,
            maxSearch: 500,
            tolerance: 0.05,
            maxCount: 64,
            searchLimit: 2000,
        });
    });

    it('should ignore empty and unrelated variables', () => {
        expect(loadConfig({ CHROMASEQ_DEFAULT_SEED: '', PATH: '/usr/bin' }).defaultSeed).toBe(0);
    });

    it('should accept negative seeds', () => {
        expect(loadConfig({ CHROMASEQ_DEFAULT_SEED: '-3' }).defaultSeed).toBe(-3);
    });

    it('should name the variable that fails to parse', () => {
        expect(() => loadConfig({ CHROMASEQ_TOLERANCE: 'abc' })).toThrow(/^Invalid configuration CHROMASEQ_TOLERANCE/);
        expect(() => loadConfig({ CHROMASEQ_TOLERANCE: '2' })).toThrow(/CHROMASEQ_TOLERANCE/);
        expect(() => loadConfig({ CHROMASEQ_MAX_COUNT: '0' })).toThrow(/CHROMASEQ_MAX_COUNT/);
        expect(() => loadConfig({ CHROMASEQ_DEFAULT_SEED: '1.5' })).toThrow(/CHROMASEQ_DEFAULT_SEED/);
    });

    it('should keep max search within the search limit', () => {
        expect(() => loadConfig({ CHROMASEQ_MAX_SEARCH: '20000', CHROMASEQ_SEARCH_LIMIT: '10000' })).toThrow(
            /exceeds CHROMASEQ_SEARCH_LIMIT/
        );
    });
});
