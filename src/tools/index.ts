/**
 * Tools aggregator - Exports all tool definitions and handlers
 */

import type { ServerConfig } from "../config.js";
import { healthTool, healthHandler } from "./health.js";
import { generateColorsTool, generateColorsHandler, generateColorsInputSchema } from "./generate_colors.js";
import { invertColorTool, invertColorHandler, invertColorInputSchema } from "./invert_color.js";
import { predictColorTool, predictColorHandler, predictColorInputSchema } from "./predict_color.js";
import {
    compareSequencesTool,
    compareSequencesHandler,
    compareSequencesInputSchema,
} from "./compare_sequences.js";

export type { ToolDefinition, ToolFailure } from "./common.js";

/**
 * All tool definitions
 */
export const tools = [
    healthTool,
    generateColorsTool,
    invertColorTool,
    predictColorTool,
    compareSequencesTool,
];

/**
 * Tool handler function type. Arguments are validated with the tool's zod
 * schema; a validation failure throws a ZodError.
 */
export type ToolHandler = (args: unknown, config: ServerConfig) => unknown;

/**
 * Map of tool names to their handlers
 */
export const toolHandlers: Record<string, ToolHandler> = {
    health: (_args, config) => healthHandler(tools.length, config),
    generate_colors: (args, config) => generateColorsHandler(generateColorsInputSchema.parse(args), config),
    invert_color: (args, config) => invertColorHandler(invertColorInputSchema.parse(args), config),
    predict_color: (args, config) => predictColorHandler(predictColorInputSchema.parse(args), config),
    compare_sequences: (args, config) => compareSequencesHandler(compareSequencesInputSchema.parse(args), config),
};

export class UnknownToolError extends Error {
    readonly toolName: string;

    constructor(toolName: string) {
        super(`Unknown tool: ${toolName}`);
        this.name = "UnknownToolError";
        this.toolName = toolName;
    }
}

/**
 * Dispatches a tool call by name
 * @throws UnknownToolError when no tool has that name
 */
export function runTool(name: string, args: unknown, config: ServerConfig): unknown {
    if (!Object.hasOwn(toolHandlers, name)) {
        throw new UnknownToolError(name);
    }
    return toolHandlers[name](args, config);
}
