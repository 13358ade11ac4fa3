/**
 * Inversion engine
 * Recovers the index that produced a color by a bounded scan of the sequence
 */

import { colorDistance, hexToRgb, type RGB } from "../lib/color/convert.js";
import { SequenceError } from "../lib/errors.js";
import { assertSeed, startIndex, type Method } from "./method.js";
import { generateColor } from "./sequences.js";

/**
 * - `nearest`: scan the whole range and keep the closest candidate below
 *   tolerance (ties to the lowest index); stops early on an exact match.
 * - `first`: return the lowest index below tolerance.
 *
 * Rotation sequences revisit a neighbourhood every convergent denominator of
 * their constant (233 for golden, 169 for kronecker √2 at the default palette),
 * so `first` can return an earlier neighbour rather than the generating index.
 */
export type SearchStrategy = "nearest" | "first";

export const DEFAULT_MAX_SEARCH = 10000;
export const DEFAULT_TOLERANCE = 0.01;

export interface InversionOptions {
    maxSearch?: number;
    tolerance?: number;
    strategy?: SearchStrategy;
}

/**
 * Outcome of one inversion. A miss is a valid result, distinguishable from
 * index 0 by `found`.
 */
export type InversionResult =
    | { found: true; index: number; distance: number }
    | { found: false; index: null; distance: null };

/**
 * Inclusive index range
 */
export interface IndexRange {
    from: number;
    to: number;
}

const NOT_FOUND: InversionResult = { found: false, index: null, distance: null };

function assertTolerance(tolerance: number): void {
    if (!(tolerance > 0 && tolerance <= Math.sqrt(3))) {
        throw new SequenceError("InvalidParameter", `Tolerance must be in (0, √3], got ${tolerance}`);
    }
}

function assertRange(range: IndexRange): void {
    if (!Number.isInteger(range.from) || !Number.isInteger(range.to) || range.from < 0) {
        throw new SequenceError(
            "InvalidParameter",
            `Search range must be non-negative integers, got [${range.from}, ${range.to}]`
        );
    }
}

/**
 * Scans one inclusive index range. An empty range (to < from) is a miss.
 */
export function searchRange(
    target: RGB,
    method: Method,
    seed: number,
    range: IndexRange,
    tolerance = DEFAULT_TOLERANCE,
    strategy: SearchStrategy = "nearest"
): InversionResult {
    assertSeed(seed);
    assertTolerance(tolerance);
    assertRange(range);

    let best: InversionResult = NOT_FOUND;
    for (let n = range.from; n <= range.to; n++) {
        const distance = colorDistance(target, generateColor(method, n, seed));
        if (distance >= tolerance) {
            continue;
        }
        if (strategy === "first" || distance === 0) {
            return { found: true, index: n, distance };
        }
        if (!best.found || distance < best.distance) {
            best = { found: true, index: n, distance };
        }
    }
    return best;
}

/**
 * Splits an inclusive range into at most `parts` disjoint, contiguous,
 * ascending sub-ranges
 */
export function partitionRange(range: IndexRange, parts: number): IndexRange[] {
    if (!Number.isInteger(parts) || parts < 1) {
        throw new SequenceError("InvalidParameter", `Partition count must be a positive integer, got ${parts}`);
    }
    const size = range.to - range.from + 1;
    if (size <= 0) {
        return [];
    }

    const chunk = Math.ceil(size / parts);
    const ranges: IndexRange[] = [];
    for (let from = range.from; from <= range.to; from += chunk) {
        ranges.push({ from, to: Math.min(from + chunk - 1, range.to) });
    }
    return ranges;
}

/**
 * Combines per-partition results. `nearest` keeps the smallest distance,
 * then the lowest index; `first` keeps the lowest index.
 */
export function mergeResults(results: readonly InversionResult[], strategy: SearchStrategy = "nearest"): InversionResult {
    let best: InversionResult = NOT_FOUND;
    for (const result of results) {
        if (!result.found) {
            continue;
        }
        if (!best.found) {
            best = result;
            continue;
        }
        const closer = result.distance < best.distance;
        const tiedLower = result.distance === best.distance && result.index < best.index;
        const lower = result.index < best.index;
        if (strategy === "first" ? lower : closer || tiedLower) {
            best = result;
        }
    }
    return best;
}

function searchBounds(method: Method, maxSearch: number): IndexRange {
    if (!Number.isInteger(maxSearch) || maxSearch < 0) {
        throw new SequenceError("InvalidParameter", `max_search must be a non-negative integer, got ${maxSearch}`);
    }
    return { from: startIndex(method), to: maxSearch };
}

/**
 * Recovers n such that generateColor(method, n, seed) is within tolerance of
 * `color`, scanning from the method's start index up to `maxSearch`
 * inclusive.
 */
export function invertColor(color: RGB, method: Method, seed: number, options: InversionOptions = {}): InversionResult {
    const { maxSearch = DEFAULT_MAX_SEARCH, tolerance = DEFAULT_TOLERANCE, strategy = "nearest" } = options;
    return searchRange(color, method, seed, searchBounds(method, maxSearch), tolerance, strategy);
}

/**
 * Same as invertColor, with the search split into `partitions` independent
 * sub-ranges whose results are merged. Each partition can run on its own
 * worker; the merged result equals the single scan.
 */
export function invertColorPartitioned(
    color: RGB,
    method: Method,
    seed: number,
    partitions: number,
    options: InversionOptions = {}
): InversionResult {
    const { maxSearch = DEFAULT_MAX_SEARCH, tolerance = DEFAULT_TOLERANCE, strategy = "nearest" } = options;
    const results = partitionRange(searchBounds(method, maxSearch), partitions).map((range) =>
        searchRange(color, method, seed, range, tolerance, strategy)
    );
    return mergeResults(results, strategy);
}

/**
 * Inverts a `#RRGGBB` color. Distances are measured against the decoded
 * continuous RGB value, never by hex equality. The strategy defaults to
 * `first`: quantization moves the target, and a later neighbour can land
 * nearer to it than the generating index.
 *
 * @throws SequenceError(MalformedColor) for an unparsable hex string
 */
export function invertHex(hex: string, method: Method, seed: number, options: InversionOptions = {}): InversionResult {
    return invertColor(hexToRgb(hex), method, seed, { ...options, strategy: options.strategy ?? "first" });
}
