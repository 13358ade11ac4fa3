/**
 * Color prediction tool
 * Computes the color a seed predicts at an index and compares an observed color against it
 */

import { z } from "zod";
import { colorDistance, hexToRgb, rgbToHex } from "../lib/color/convert.js";
import { SequenceError } from "../lib/errors.js";
import { createMethod, type MethodKind } from "../engine/method.js";
import { generateColor } from "../engine/sequences.js";
import type { ServerConfig } from "../config.js";
import { methodArgs, methodProperties, toFailure, type ToolDefinition, type ToolFailure } from "./common.js";

export const predictColorInputSchema = z.object({
    ...methodArgs,
    index: z.number().int().nonnegative(),
    observed_hex: z.string().optional(),
    tolerance: z.number().positive().optional(),
});

export type PredictColorInput = z.infer<typeof predictColorInputSchema>;

export interface PredictColorOutput {
    ok: true;
    method: MethodKind;
    seed: number;
    index: number;
    predicted: string;
    observed?: string;
    distance?: number;
    tolerance?: number;
    match?: boolean;
}

export function predictColorHandler(input: PredictColorInput, config: ServerConfig): PredictColorOutput | ToolFailure {
    try {
        const method = createMethod(input.method, input.params);
        const seed = input.seed ?? config.defaultSeed;
        const predicted = generateColor(method, input.index, seed);
        const base: PredictColorOutput = {
            ok: true,
            method: method.kind,
            seed,
            index: input.index,
            predicted: rgbToHex(predicted),
        };

        if (input.observed_hex === undefined) {
            return base;
        }

        const tolerance = input.tolerance ?? config.tolerance;
        if (tolerance > Math.sqrt(3)) {
            throw new SequenceError("InvalidParameter", `Tolerance must be in (0, √3], got ${tolerance}`);
        }
        const observed = hexToRgb(input.observed_hex);
        const distance = colorDistance(predicted, observed);

        return {
            ...base,
            observed: rgbToHex(observed),
            distance,
            tolerance,
            match: distance < tolerance,
        };
    } catch (error) {
        return toFailure(error);
    }
}

/**
 * Predict color tool definition for MCP
 */
export const predictColorTool: ToolDefinition = {
    name: "predict_color",
    description:
        "Computes the color a (method, seed) pair predicts at an index. With observed_hex, also reports the RGB distance and whether it is within tolerance.",
    inputSchema: {
        type: "object",
        properties: {
            ...methodProperties,
            index: {
                type: "integer",
                description: "Sequence index to predict",
                minimum: 0,
            },
            observed_hex: {
                type: "string",
                description: "Optional observed hex color to compare with the prediction",
            },
            tolerance: {
                type: "number",
                description: "Maximum RGB distance for a match (default: 0.01)",
            },
        },
        required: ["method", "index"],
    },
};
