/**
 * Discrepancy analyzer
 * Gap-based dispersion of a sequence's primary coordinate stream
 */

import { SequenceError } from "../lib/errors.js";
import { methodLabel, startIndex, type Method } from "./method.js";
import { sequencePoint } from "./sequences.js";

export interface DiscrepancyEntry {
    label: string;
    dispersion: number;
}

export interface DiscrepancyReport {
    n: number;
    seed: number;
    entries: DiscrepancyEntry[];
    /**
     * Labels ordered from most to least uniform
     */
    ranking: string[];
}

/**
 * Standard deviation of the gaps between sorted points, with 0 and 1 added
 * as endpoints. Lower means more uniform; evenly spaced points give 0.
 */
export function discrepancy(points: readonly number[]): number {
    const sorted = [...points].sort((a, b) => a - b);
    const edges = [0, ...sorted, 1];
    const gaps: number[] = [];
    for (let i = 1; i < edges.length; i++) {
        gaps.push(edges[i] - edges[i - 1]);
    }

    let sum = 0;
    for (const gap of gaps) {
        sum += gap;
    }
    const mean = sum / gaps.length;

    let squares = 0;
    for (const gap of gaps) {
        const d = gap - mean;
        squares += d * d;
    }
    return Math.sqrt(squares / gaps.length);
}

/**
 * First coordinate of `count` consecutive points from the method's start index
 */
export function primaryStream(method: Method, count: number, seed = 0): number[] {
    const start = startIndex(method);
    const points: number[] = [];
    for (let i = 0; i < count; i++) {
        points.push(sequencePoint(method, start + i, seed)[0]);
    }
    return points;
}

function uniqueLabels(methods: readonly Method[]): string[] {
    const seen = new Map<string, number>();
    return methods.map((method) => {
        const label = methodLabel(method);
        const count = (seen.get(label) ?? 0) + 1;
        seen.set(label, count);
        return count === 1 ? label : `${label}#${count}`;
    });
}

/**
 * Ranks methods by the discrepancy of their first `n` primary coordinates,
 * ascending. Equal scores keep their input order.
 */
export function compareSequences(n: number, methods: readonly Method[], seed = 0): DiscrepancyReport {
    if (!Number.isInteger(n) || n < 1) {
        throw new SequenceError("InvalidParameter", `Sample size must be a positive integer, got ${n}`);
    }

    const labels = uniqueLabels(methods);
    const entries = methods.map((method, i) => ({
        label: labels[i],
        dispersion: discrepancy(primaryStream(method, n, seed)),
    }));
    const ranking = [...entries]
        .sort((a, b) => a.dispersion - b.dispersion)
        .map((entry) => entry.label);

    return { n, seed, entries, ranking };
}
