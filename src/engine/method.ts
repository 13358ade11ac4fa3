/**
 * Sequence method model
 * Closed tagged union of the eight generators and their parameter sets
 */

import { z } from "zod";
import { SequenceError } from "../lib/errors.js";
import { PHI, PHI2, rSequenceRoot, type ContinuedFractionExpansion } from "../lib/math/roots.js";

/**
 * Wire tags, in presentation order
 */
export const METHOD_KINDS = [
    "golden",
    "plastic",
    "halton",
    "r_sequence",
    "kronecker",
    "sobol",
    "pisot",
    "continued_fraction",
] as const;

export type MethodKind = (typeof METHOD_KINDS)[number];

/**
 * How three coordinates become a color: used directly as RGB, or scaled to
 * h = x₁·360, s = x₂·0.5+0.5, l = x₃·0.3+0.4
 */
export type ColorMode = "rgb" | "hsl";

export interface GoldenMethod {
    kind: "golden";
    saturation: number;
    lightness: number;
}

export interface PlasticMethod {
    kind: "plastic";
    lightness: number;
}

export interface HaltonMethod {
    kind: "halton";
    bases: [number, number, number];
    mode: ColorMode;
}

export interface RSequenceMethod {
    kind: "r_sequence";
    dim: number;
    lightness: number;
}

export interface KroneckerMethod {
    kind: "kronecker";
    alpha: number;
    saturation: number;
    lightness: number;
}

export interface SobolMethod {
    kind: "sobol";
    mode: ColorMode;
}

export interface PisotMethod {
    kind: "pisot";
    theta: number;
    saturation: number;
    lightness: number;
}

export interface ContinuedFractionMethod {
    kind: "continued_fraction";
    expansion: ContinuedFractionExpansion;
    saturation: number;
    lightness: number;
}

export type Method =
    | GoldenMethod
    | PlasticMethod
    | HaltonMethod
    | RSequenceMethod
    | KroneckerMethod
    | SobolMethod
    | PisotMethod
    | ContinuedFractionMethod;

/**
 * Highest R-sequence dimension accepted. Newton's method from 1.5 converges
 * within its iteration cap up to d = 38.
 */
export const MAX_R_DIMENSION = 32;

/**
 * Highest index accepted by any generator
 */
export const MAX_INDEX = 2 ** 31 - 1;

function isPrime(value: number): boolean {
    if (value < 2) {
        return false;
    }
    for (let d = 2; d * d <= value; d++) {
        if (value % d === 0) {
            return false;
        }
    }
    return true;
}

const unit = z.number().min(0).max(1);
const colorMode = z.enum(["rgb", "hsl"]);
const primeBase = z
    .number()
    .int()
    .refine(isPrime, { message: "Halton bases must be prime" });

const paramSchemas = {
    golden: z.object({
        saturation: unit.default(0.7),
        lightness: unit.default(0.5),
    }),
    plastic: z.object({
        lightness: unit.default(0.5),
    }),
    halton: z.object({
        bases: z.tuple([primeBase, primeBase, primeBase]).default([2, 3, 5]),
        mode: colorMode.default("rgb"),
    }),
    r_sequence: z.object({
        dim: z.number().int().min(1).max(MAX_R_DIMENSION).default(3),
        lightness: unit.default(0.5),
    }),
    kronecker: z.object({
        alpha: z
            .number()
            .positive()
            .finite()
            .refine((value) => !Number.isInteger(value), {
                message: "alpha must not be an integer",
            })
            .default(Math.SQRT2),
        saturation: unit.default(0.7),
        lightness: unit.default(0.55),
    }),
    sobol: z.object({
        mode: colorMode.default("hsl"),
    }),
    pisot: z.object({
        theta: z.number().finite().gt(1).default(PHI),
        saturation: unit.default(0.7),
        lightness: unit.default(0.55),
    }),
    continued_fraction: z.object({
        expansion: z.enum(["golden", "sqrt2", "e"]).default("golden"),
        saturation: unit.default(0.7),
        lightness: unit.default(0.55),
    }),
};

const KNOWN_KINDS: ReadonlySet<string> = new Set(METHOD_KINDS);

export function isMethodKind(tag: string): tag is MethodKind {
    return KNOWN_KINDS.has(tag);
}

function parseParams<S extends z.ZodTypeAny>(schema: S, kind: MethodKind, params: unknown): z.output<S> {
    const result = schema.safeParse(params ?? {});
    if (!result.success) {
        const issue = result.error.issues[0];
        const path = issue?.path.join(".") || "params";
        throw new SequenceError(
            "InvalidParameter",
            `Invalid ${kind} parameter "${path}": ${issue?.message ?? "unrecognized value"}`
        );
    }
    return result.data;
}

/**
 * Builds a method from its wire tag and parameter object. Keys that belong to
 * other methods are ignored.
 *
 * @throws SequenceError(UnknownMethod) for an unrecognized tag
 * @throws SequenceError(InvalidParameter) for an out-of-range parameter
 */
export function createMethod(tag: string, params: unknown = {}): Method {
    if (!isMethodKind(tag)) {
        throw new SequenceError(
            "UnknownMethod",
            `Unknown method "${tag}". Expected one of: ${METHOD_KINDS.join(", ")}`
        );
    }

    switch (tag) {
        case "golden":
            return { kind: tag, ...parseParams(paramSchemas.golden, tag, params) };
        case "plastic":
            return { kind: tag, ...parseParams(paramSchemas.plastic, tag, params) };
        case "halton":
            return { kind: tag, ...parseParams(paramSchemas.halton, tag, params) };
        case "r_sequence":
            return { kind: tag, ...parseParams(paramSchemas.r_sequence, tag, params) };
        case "kronecker":
            return { kind: tag, ...parseParams(paramSchemas.kronecker, tag, params) };
        case "sobol":
            return { kind: tag, ...parseParams(paramSchemas.sobol, tag, params) };
        case "pisot":
            return { kind: tag, ...parseParams(paramSchemas.pisot, tag, params) };
        case "continued_fraction":
            return { kind: tag, ...parseParams(paramSchemas.continued_fraction, tag, params) };
    }
}

/**
 * Method with every parameter at its default
 */
export function defaultMethod(kind: MethodKind): Method {
    return createMethod(kind);
}

/**
 * First index of a method's natural enumeration: Sobol's Gray-code walk starts
 * at 0, every other sequence at 1.
 */
export function startIndex(method: Method): number {
    return method.kind === "sobol" ? 0 : 1;
}

/**
 * The real number a method is built on, or null for digit-based methods
 */
export function methodConstant(method: Method): number | null {
    switch (method.kind) {
        case "golden":
            return PHI;
        case "plastic":
            return PHI2;
        case "r_sequence":
            return rSequenceRoot(method.dim);
        case "kronecker":
            return method.alpha;
        case "pisot":
            return method.theta;
        case "halton":
        case "sobol":
        case "continued_fraction":
            return null;
    }
}

function formatParam(value: unknown): string {
    return Array.isArray(value) ? value.join("/") : String(value);
}

/**
 * Display label: the tag, followed by any parameters that differ from the
 * defaults, e.g. `kronecker(alpha=1.7320508075688772)`
 */
export function methodLabel(method: Method): string {
    const defaults: Record<string, unknown> = { ...defaultMethod(method.kind) };
    const changed = Object.entries(method)
        .filter(([key, value]) => key !== "kind" && formatParam(value) !== formatParam(defaults[key]))
        .map(([key, value]) => `${key}=${formatParam(value)}`);
    return changed.length === 0 ? method.kind : `${method.kind}(${changed.join(", ")})`;
}

/**
 * Parameters of a method without its tag, as sent back on the wire
 */
export function methodParams(method: Method): Record<string, unknown> {
    const { kind: _kind, ...params } = method;
    return params;
}

/**
 * Validates an index for generation
 * @throws SequenceError(InvalidParameter)
 */
export function assertIndex(n: number): void {
    if (!Number.isInteger(n) || n < 0 || n > MAX_INDEX) {
        throw new SequenceError("InvalidParameter", `Index must be an integer in [0, ${MAX_INDEX}], got ${n}`);
    }
}

/**
 * Validates a seed
 * @throws SequenceError(InvalidParameter)
 */
export function assertSeed(seed: number): void {
    if (!Number.isSafeInteger(seed)) {
        throw new SequenceError("InvalidParameter", `Seed must be a safe integer, got ${seed}`);
    }
}
