/**
 * Color inversion tool
 * Recovers the sequence index that produced a hex color
 */

import { z } from "zod";
import { normalizeHex, rgbToHex } from "../lib/color/convert.js";
import { SequenceError } from "../lib/errors.js";
import { createMethod, type MethodKind } from "../engine/method.js";
import { invertHex, type SearchStrategy } from "../engine/inversion.js";
import { generateColor } from "../engine/sequences.js";
import type { ServerConfig } from "../config.js";
import { methodArgs, methodProperties, toFailure, type ToolDefinition, type ToolFailure } from "./common.js";

export const invertColorInputSchema = z.object({
    ...methodArgs,
    hex: z.string(),
    max_search: z.number().int().nonnegative().optional(),
    tolerance: z.number().positive().optional(),
    strategy: z.enum(["nearest", "first"]).optional(),
});

export type InvertColorInput = z.infer<typeof invertColorInputSchema>;

export interface InvertColorOutput {
    ok: true;
    found: boolean;
    index: number | null;
    distance: number | null;
    hex: string;
    method: MethodKind;
    seed: number;
    max_search: number;
    tolerance: number;
    strategy: SearchStrategy;
    /** Color regenerated at the recovered index */
    verification?: string;
    message: string;
}

/**
 * Inverts a color. A miss is reported as `found: false` with a null index.
 */
export function invertColorHandler(input: InvertColorInput, config: ServerConfig): InvertColorOutput | ToolFailure {
    try {
        const hex = normalizeHex(input.hex);
        const method = createMethod(input.method, input.params);
        const seed = input.seed ?? config.defaultSeed;
        const maxSearch = input.max_search ?? config.maxSearch;
        const tolerance = input.tolerance ?? config.tolerance;
        const strategy = input.strategy ?? "first";

        if (maxSearch > config.searchLimit) {
            throw new SequenceError("InvalidParameter", `max_search ${maxSearch} exceeds the limit of ${config.searchLimit}`);
        }

        const result = invertHex(hex, method, seed, { maxSearch, tolerance, strategy });
        const common = {
            ok: true as const,
            hex,
            method: method.kind,
            seed,
            max_search: maxSearch,
            tolerance,
            strategy,
        };

        if (!result.found) {
            return {
                ...common,
                found: false,
                index: null,
                distance: null,
                message: "Index not found within search range",
            };
        }

        return {
            ...common,
            found: true,
            index: result.index,
            distance: result.distance,
            verification: rgbToHex(generateColor(method, result.index, seed)),
            message: `Recovered index ${result.index}`,
        };
    } catch (error) {
        return toFailure(error);
    }
}

/**
 * Invert color tool definition for MCP
 */
export const invertColorTool: ToolDefinition = {
    name: "invert_color",
    description:
        "Recovers the index n that produced a color, given the method, its parameters and the seed. Scans indices from the method's start up to max_search.",
    inputSchema: {
        type: "object",
        properties: {
            hex: {
                type: "string",
                description: "Hex color code (e.g., #851BE4 or 851BE4)",
            },
            ...methodProperties,
            max_search: {
                type: "integer",
                description: "Highest index to scan (default: 10000)",
                minimum: 0,
            },
            tolerance: {
                type: "number",
                description: "Maximum RGB distance for a match (default: 0.01)",
            },
            strategy: {
                type: "string",
                description: "first: lowest matching index (default); nearest: closest match in range",
                enum: ["nearest", "first"],
            },
        },
        required: ["hex", "method"],
    },
};
