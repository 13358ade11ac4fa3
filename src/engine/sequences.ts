/**
 * Low-discrepancy sequence generators
 *
 * Each method maps (index, seed) to a point in [0,1)^d, and the point to a
 * color. Rotation methods (golden, plastic, r_sequence, kronecker, pisot,
 * continued_fraction) add the seed before taking the fractional part;
 * digit-reflection methods (halton, sobol) offset the index by the seed.
 * Halton takes every safe-integer seed to a distinct offset. Sobol reads 30
 * bits of the index, so its offsets and indices wrap at 2³⁰.
 *
 * Every rotation coordinate is computed as frac(seed + <term>) with <term> evaluated
 * first; reordering the sum changes the low bits of the result.
 */

import { hslToRgb, type RGB } from "../lib/color/convert.js";
import { SequenceError } from "../lib/errors.js";
import { PHI, PHI2, convergentValue, rSequenceRoot } from "../lib/math/roots.js";
import { assertIndex, assertSeed, startIndex, type ColorMode, type Method } from "./method.js";

const SOBOL_BITS = 30;
const SOBOL_SCALE = 2 ** SOBOL_BITS;
export const SOBOL_PERIOD = 2 ** SOBOL_BITS;

/**
 * Primitive polynomials for Sobol dimensions 1..5 as (degree, coefficients)
 */
const SOBOL_POLYNOMIALS: ReadonlyArray<{ degree: number; coeffs: readonly number[] }> = [
    { degree: 1, coeffs: [1] }, // x
    { degree: 2, coeffs: [1, 1] }, // x² + x + 1
    { degree: 3, coeffs: [1, 0, 1] }, // x³ + x + 1
    { degree: 4, coeffs: [1, 1, 0, 1] }, // x⁴ + x + 1
    { degree: 5, coeffs: [1, 0, 1, 0, 1] }, // x⁵ + x² + 1
];

const directionCache = new Map<number, readonly number[]>();

/**
 * Fractional part, x - floor(x). Always in [0, 1), including for negative x.
 */
export function frac(x: number): number {
    return x - Math.floor(x);
}

/**
 * Van der Corput radical inverse: reflects the base-b digits of n around the
 * radix point.
 *
 * n = 5, base 2: 101₂ → 0.101₂ = 0.625
 */
export function vanDerCorput(n: number, base: number): number {
    let result = 0;
    let f = 1 / base;
    let i = n;
    while (i > 0) {
        result += f * (i % base);
        i = (i - (i % base)) / base;
        f = f / base;
    }
    return result;
}

/**
 * Reflected binary Gray code: n XOR (n >> 1)
 */
export function grayCode(n: number): number {
    return (n ^ (n >>> 1)) >>> 0;
}

/**
 * 30-bit Sobol direction numbers for a dimension (1-based). Dimensions past
 * the polynomial table reuse its last entry.
 */
export function sobolDirectionNumbers(dim: number): readonly number[] {
    const cached = directionCache.get(dim);
    if (cached) {
        return cached;
    }

    const { degree, coeffs } = SOBOL_POLYNOMIALS[Math.min(Math.max(dim, 1), SOBOL_POLYNOMIALS.length) - 1];
    const v = new Array<number>(SOBOL_BITS).fill(0);

    for (let i = 0; i < Math.min(degree, SOBOL_BITS); i++) {
        v[i] = 1 << (SOBOL_BITS - 1 - i);
    }
    for (let i = degree; i < SOBOL_BITS; i++) {
        let value = v[i - degree];
        for (let j = 1; j <= degree; j++) {
            if (coeffs[j - 1] === 1) {
                value ^= v[i - j] >>> j;
            }
        }
        v[i] = value >>> 0;
    }

    const frozen = Object.freeze(v);
    directionCache.set(dim, frozen);
    return frozen;
}

/**
 * k-th Sobol point in one dimension, in [0, 1)
 */
export function sobolPoint(k: number, dim: number): number {
    const g = grayCode(k);
    const v = sobolDirectionNumbers(dim);

    let x = 0;
    for (let i = 0; i < SOBOL_BITS; i++) {
        if (((g >>> i) & 1) === 1) {
            x = (x ^ v[i]) >>> 0;
        }
    }
    return x / SOBOL_SCALE;
}

/**
 * Halton index: n shifted by the zigzag of the seed (0, -1, 1, -2, 2, ... to
 * 0, 1, 2, 3, 4, ...), so distinct seeds never share an offset.
 * @throws SequenceError(InvalidParameter) when the shifted index is not a safe integer
 */
export function haltonIndex(n: number, seed: number): number {
    const offset = seed >= 0 ? 2 * seed : -2 * seed - 1;
    const k = n + offset;
    if (!Number.isSafeInteger(k)) {
        throw new SequenceError("InvalidParameter", `Seed ${seed} is too large for a Halton index`);
    }
    return k;
}

/**
 * Sobol index: (n + seed) reduced mod 2³⁰, the period of the 30-bit direction table
 */
export function sobolIndex(n: number, seed: number): number {
    const offset = ((seed % SOBOL_PERIOD) + SOBOL_PERIOD) % SOBOL_PERIOD;
    return (n + offset) % SOBOL_PERIOD;
}

function threeDimensionalColor(x1: number, x2: number, x3: number, mode: ColorMode): RGB {
    if (mode === "rgb") {
        return { r: x1, g: x2, b: x3 };
    }
    return hslToRgb(x1 * 360, x2 * 0.5 + 0.5, x3 * 0.3 + 0.4);
}

/**
 * Coordinates of the n-th point of a method's sequence, each in [0, 1).
 * The first coordinate is the method's primary stream.
 */
export function sequencePoint(method: Method, n: number, seed = 0): number[] {
    assertIndex(n);
    assertSeed(seed);

    switch (method.kind) {
        case "golden":
            return [frac(seed + n / PHI)];
        case "plastic":
            return [frac(seed + n / PHI2), frac(seed + n / (PHI2 * PHI2))];
        case "halton": {
            const k = haltonIndex(n, seed);
            return method.bases.map((base) => vanDerCorput(k, base));
        }
        case "r_sequence": {
            const phi = rSequenceRoot(method.dim);
            const point = [frac(seed + n / phi), frac(seed + n / (phi * phi))];
            if (method.dim !== 2) {
                point.push(frac(seed + n / (phi * phi * phi)));
            }
            return point;
        }
        case "kronecker":
            return [frac(seed + n * method.alpha)];
        case "sobol": {
            const k = sobolIndex(n, seed);
            return [sobolPoint(k, 1), sobolPoint(k, 2), sobolPoint(k, 3)];
        }
        case "pisot": {
            // Powers past the double range are integral anyway
            const power = Math.round(Math.pow(method.theta, n));
            return [Number.isFinite(power) ? frac(seed + power) : 0];
        }
        case "continued_fraction":
            return [frac(seed + convergentValue(method.expansion, n))];
    }
}

/**
 * Maps a sequence point to a color according to the method's palette
 */
export function pointToColor(method: Method, point: readonly number[]): RGB {
    const [x1 = 0, x2 = 0, x3 = 0] = point;

    switch (method.kind) {
        case "golden":
        case "kronecker":
        case "pisot":
        case "continued_fraction":
            return hslToRgb(x1 * 360, method.saturation, method.lightness);
        case "plastic":
            return hslToRgb(x1 * 360, x2 * 0.5 + 0.5, method.lightness);
        case "r_sequence":
            return hslToRgb(
                x1 * 360,
                x2 * 0.5 + 0.5,
                method.dim === 2 ? method.lightness : x3 * 0.3 + 0.4
            );
        case "halton":
        case "sobol":
            return threeDimensionalColor(x1, x2, x3, method.mode);
    }
}

/**
 * Generates the color at index n. Pure: identical (method, n, seed) always
 * yield the identical color.
 *
 * @throws SequenceError(InvalidParameter) for a bad index or seed
 */
export function generateColor(method: Method, n: number, seed = 0): RGB {
    return pointToColor(method, sequencePoint(method, n, seed));
}

/**
 * Generates `count` consecutive colors beginning at `start` (default: the
 * method's natural start index)
 */
export function generateSequence(method: Method, count: number, seed = 0, start = startIndex(method)): RGB[] {
    const colors: RGB[] = [];
    for (let i = 0; i < count; i++) {
        colors.push(generateColor(method, start + i, seed));
    }
    return colors;
}
