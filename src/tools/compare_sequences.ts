/**
 * Sequence comparison tool
 * Ranks methods by the gap dispersion of their primary coordinate
 */

import { z } from "zod";
import { SequenceError } from "../lib/errors.js";
import { createMethod, type Method } from "../engine/method.js";
import { compareSequences } from "../engine/discrepancy.js";
import type { ServerConfig } from "../config.js";
import { toFailure, type ToolDefinition, type ToolFailure } from "./common.js";

export const DEFAULT_COMPARISON_METHODS = ["golden", "plastic", "halton", "kronecker", "sobol"] as const;

const methodSpec = z.union([
    z.string(),
    z.object({
        method: z.string(),
        params: z.record(z.unknown()).optional(),
    }),
]);

export const compareSequencesInputSchema = z.object({
    n: z.number().int().positive().optional(),
    methods: z.array(methodSpec).min(1).optional(),
    seed: z.number().int().optional(),
});

export type CompareSequencesInput = z.infer<typeof compareSequencesInputSchema>;

export interface CompareSequencesOutput {
    ok: true;
    n: number;
    seed: number;
    discrepancy: Record<string, number>;
    ranking: string[];
    best: string;
    worst: string;
    metric: string;
}

function toMethod(spec: z.infer<typeof methodSpec>): Method {
    return typeof spec === "string" ? createMethod(spec) : createMethod(spec.method, spec.params);
}

export function compareSequencesHandler(
    input: CompareSequencesInput,
    config: ServerConfig
): CompareSequencesOutput | ToolFailure {
    try {
        const n = input.n ?? 1000;
        if (n > config.maxCount) {
            throw new SequenceError("InvalidParameter", `n ${n} exceeds the limit of ${config.maxCount}`);
        }

        const methods = (input.methods ?? [...DEFAULT_COMPARISON_METHODS]).map(toMethod);
        const seed = input.seed ?? config.defaultSeed;
        const report = compareSequences(n, methods, seed);

        return {
            ok: true,
            n,
            seed,
            discrepancy: Object.fromEntries(report.entries.map((entry) => [entry.label, entry.dispersion])),
            ranking: report.ranking,
            best: report.ranking[0],
            worst: report.ranking[report.ranking.length - 1],
            metric: "Standard deviation of gaps in [0,1); lower is more uniform",
        };
    } catch (error) {
        return toFailure(error);
    }
}

/**
 * Compare sequences tool definition for MCP
 */
export const compareSequencesTool: ToolDefinition = {
    name: "compare_sequences",
    description:
        "Compares the uniformity of sequence methods by the standard deviation of gaps between their first n primary coordinates.",
    inputSchema: {
        type: "object",
        properties: {
            n: {
                type: "integer",
                description: "Number of points per method (default: 1000)",
                minimum: 1,
            },
            methods: {
                type: "array",
                description:
                    "Methods to compare: tags, or { method, params } objects (default: golden, plastic, halton, kronecker, sobol)",
                items: {
                    oneOf: [
                        { type: "string" },
                        {
                            type: "object",
                            properties: {
                                method: { type: "string" },
                                params: { type: "object" },
                            },
                            required: ["method"],
                        },
                    ],
                },
            },
            seed: {
                type: "integer",
                description: "Sequence seed (default: server default seed)",
            },
        },
    },
};
