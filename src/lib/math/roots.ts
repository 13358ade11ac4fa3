/**
 * Metallic constants and continued-fraction convergents
 */

import { SequenceError } from "../errors.js";

/**
 * Golden ratio φ: x² = x + 1
 */
export const PHI = 1.618033988749895;

/**
 * Plastic constant φ₂: x³ = x + 1
 */
export const PHI2 = 1.324717957244746;

const NEWTON_GUESS = 1.5;
const NEWTON_STEP_TOLERANCE = 1e-10;
const NEWTON_MAX_ITERATIONS = 20;

/**
 * Maximum number of partial quotients used when evaluating a convergent
 */
export const MAX_CONVERGENT_DEPTH = 64;

const rootCache = new Map<number, number>();

/**
 * Computes φ_d, the real root > 1 of x^(d+1) = x + 1, by Newton's method
 * from 1.5.
 *
 * d = 1 gives the golden ratio, d = 2 the plastic constant.
 *
 * @throws SequenceError(NonConvergentRoot) if the step never drops below
 * 1e-10 within 20 iterations
 */
export function rSequenceRoot(d: number): number {
    const cached = rootCache.get(d);
    if (cached !== undefined) {
        return cached;
    }

    const f = (x: number) => Math.pow(x, d + 1) - x - 1;
    const df = (x: number) => (d + 1) * Math.pow(x, d) - 1;

    let x = NEWTON_GUESS;
    for (let i = 0; i < NEWTON_MAX_ITERATIONS; i++) {
        const next = x - f(x) / df(x);
        if (Math.abs(next - x) < NEWTON_STEP_TOLERANCE) {
            rootCache.set(d, next);
            return next;
        }
        x = next;
    }

    throw new SequenceError(
        "NonConvergentRoot",
        `Newton iteration for x^${d + 1} = x + 1 did not converge in ${NEWTON_MAX_ITERATIONS} steps`
    );
}

/**
 * Convergent p/q of a continued fraction
 */
export interface Convergent {
    p: number;
    q: number;
}

/**
 * Computes the k-th convergent (0-based) of [a₀; a₁, a₂, ...].
 *
 * p_i = a_i·p_{i-1} + p_{i-2}, q_i = a_i·q_{i-1} + q_{i-2}, seeded with
 * p_{-1} = 1, q_{-1} = 0. An index past the end of `coeffs` yields the last
 * available convergent.
 */
export function continuedFractionConvergent(coeffs: readonly number[], k: number): Convergent {
    if (coeffs.length === 0) {
        throw new SequenceError("InvalidParameter", "Continued fraction needs at least one coefficient");
    }

    let pPrev = 0;
    let p = 1;
    let qPrev = 1;
    let q = 0;
    const last = Math.min(k, coeffs.length - 1);
    for (let i = 0; i <= last; i++) {
        [pPrev, p] = [p, coeffs[i] * p + pPrev];
        [qPrev, q] = [q, coeffs[i] * q + qPrev];
    }
    return { p, q };
}

/**
 * Supported continued-fraction expansions
 */
export type ContinuedFractionExpansion = "golden" | "sqrt2" | "e";

/**
 * Partial quotients a₀..a_{terms-1} of an expansion
 *
 * - golden: [1; 1, 1, 1, ...]
 * - sqrt2: [1; 2, 2, 2, ...]
 * - e: [2; 1, 2, 1, 1, 4, 1, 1, 6, ...]
 */
export function expansionCoefficients(expansion: ContinuedFractionExpansion, terms: number): number[] {
    switch (expansion) {
        case "golden":
            return Array.from({ length: terms }, () => 1);
        case "sqrt2":
            return Array.from({ length: terms }, (_, i) => (i === 0 ? 1 : 2));
        case "e": {
            const coeffs = [2];
            for (let k = 1; coeffs.length < terms; k++) {
                coeffs.push(1, 2 * k, 1);
            }
            return coeffs.slice(0, terms);
        }
    }
}

/**
 * Value of the n-th convergent of an expansion, depth capped at
 * MAX_CONVERGENT_DEPTH
 */
export function convergentValue(expansion: ContinuedFractionExpansion, n: number): number {
    const depth = Math.min(n, MAX_CONVERGENT_DEPTH);
    const { p, q } = continuedFractionConvergent(expansionCoefficients(expansion, depth + 1), depth);
    return p / q;
}
