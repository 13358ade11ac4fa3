/**
 * Sequence color generation tool
 * Produces consecutive colors of a low-discrepancy sequence as #RRGGBB
 */

import { z } from "zod";
import { rgbToHex } from "../lib/color/convert.js";
import { SequenceError } from "../lib/errors.js";
import {
    createMethod,
    methodConstant,
    methodLabel,
    methodParams,
    startIndex,
    type MethodKind,
} from "../engine/method.js";
import { generateSequence } from "../engine/sequences.js";
import type { ServerConfig } from "../config.js";
import { methodArgs, methodProperties, toFailure, type ToolDefinition, type ToolFailure } from "./common.js";

export const generateColorsInputSchema = z.object({
    ...methodArgs,
    count: z.number().int().positive(),
    start: z.number().int().nonnegative().optional(),
});

export type GenerateColorsInput = z.infer<typeof generateColorsInputSchema>;

export interface GenerateColorsOutput {
    ok: true;
    method: MethodKind;
    label: string;
    params: Record<string, unknown>;
    seed: number;
    start: number;
    count: number;
    colors: string[];
    constant?: number;
}

/**
 * Generates `count` colors starting at `start` (default: the method's natural
 * start index, 0 for sobol and 1 otherwise)
 */
export function generateColorsHandler(
    input: GenerateColorsInput,
    config: ServerConfig
): GenerateColorsOutput | ToolFailure {
    try {
        if (input.count > config.maxCount) {
            throw new SequenceError("InvalidParameter", `count ${input.count} exceeds the limit of ${config.maxCount}`);
        }

        const method = createMethod(input.method, input.params);
        const seed = input.seed ?? config.defaultSeed;
        const start = input.start ?? startIndex(method);
        const colors = generateSequence(method, input.count, seed, start).map(rgbToHex);
        const constant = methodConstant(method);

        return {
            ok: true,
            method: method.kind,
            label: methodLabel(method),
            params: methodParams(method),
            seed,
            start,
            count: input.count,
            colors,
            ...(constant === null ? {} : { constant }),
        };
    } catch (error) {
        return toFailure(error);
    }
}

/**
 * Generate colors tool definition for MCP
 */
export const generateColorsTool: ToolDefinition = {
    name: "generate_colors",
    description:
        "Generates consecutive deterministic colors from a low-discrepancy sequence (golden, plastic, halton, r_sequence, kronecker, sobol, pisot, continued_fraction). Every color can be inverted back to its index.",
    inputSchema: {
        type: "object",
        properties: {
            ...methodProperties,
            count: {
                type: "integer",
                description: "Number of colors to generate",
                minimum: 1,
            },
            start: {
                type: "integer",
                description: "First index (default: 0 for sobol, 1 otherwise)",
                minimum: 0,
            },
        },
        required: ["method", "count"],
    },
};
