/**
 * Shared pieces of the sequence tools: argument schemas, JSON Schema
 * fragments and the failure envelope
 */

import { z } from "zod";
import { isInputError, type SequenceErrorKind } from "../lib/errors.js";
import { METHOD_KINDS } from "../engine/method.js";

/**
 * Tool definition type
 */
export interface ToolDefinition {
    name: string;
    description: string;
    inputSchema: {
        type: "object";
        properties?: Record<string, unknown>;
        required?: string[];
    };
}

/**
 * Returned instead of a result when the caller's input was rejected by the
 * engine
 */
export interface ToolFailure {
    ok: false;
    error: string;
    kind: SequenceErrorKind;
}

/**
 * Converts an engine input error into a failure envelope. Anything else is
 * rethrown.
 */
export function toFailure(error: unknown): ToolFailure {
    if (isInputError(error)) {
        return {
            ok: false,
            error: error.message,
            kind: error.kind,
        };
    }
    throw error;
}

/**
 * Zod shape shared by every tool that selects a method. The tag stays a plain
 * string here so an unknown tag surfaces as UnknownMethod from the engine.
 */
export const methodArgs = {
    method: z.string(),
    params: z.record(z.unknown()).optional(),
    seed: z.number().int().optional(),
};

export const methodProperties = {
    method: {
        type: "string",
        description: "Sequence method",
        enum: [...METHOD_KINDS],
    },
    params: {
        type: "object",
        description:
            "Method parameters. golden: saturation, lightness; plastic: lightness; halton: bases (3 primes), mode (rgb|hsl); " +
            "r_sequence: dim (1-32), lightness; kronecker: alpha, saturation, lightness; sobol: mode (rgb|hsl); " +
            "pisot: theta, saturation, lightness; continued_fraction: expansion (golden|sqrt2|e), saturation, lightness. " +
            "Keys for other methods are ignored.",
    },
    seed: {
        type: "integer",
        description: "Sequence seed (default: server default seed)",
    },
};
