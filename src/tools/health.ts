/**
 * Health check tool - Returns server status and defaults
 */

import { readFileSync } from "fs";
import { resolve } from "path";
import { METHOD_KINDS, type MethodKind } from "../engine/method.js";
import type { ServerConfig } from "../config.js";
import type { ToolDefinition } from "./common.js";

export interface HealthOutput {
    ok: true;
    version: string;
    uptimeSec: number;
    toolCount: number;
    methods: MethodKind[];
    defaults: {
        seed: number;
        maxSearch: number;
        tolerance: number;
    };
}

// Track server start time
const startTime = Date.now();

function readPackageVersion(): string {
    try {
        const packagePath = resolve(process.cwd(), "package.json");
        const packageJson: unknown = JSON.parse(readFileSync(packagePath, "utf-8"));
        if (
            typeof packageJson === "object" &&
            packageJson !== null &&
            "version" in packageJson &&
            typeof packageJson.version === "string"
        ) {
            return packageJson.version;
        }
        return "unknown";
    } catch {
        return "unknown";
    }
}

/**
 * Get version from the VERSION environment variable or package.json
 */
export function getVersion(): string {
    return process.env.VERSION || readPackageVersion();
}

/**
 * Health check handler
 * @param toolCount - Number of tools the server exposes
 */
export function healthHandler(toolCount: number, config: ServerConfig): HealthOutput {
    return {
        ok: true,
        version: getVersion(),
        uptimeSec: Math.floor((Date.now() - startTime) / 1000),
        toolCount,
        methods: [...METHOD_KINDS],
        defaults: {
            seed: config.defaultSeed,
            maxSearch: config.maxSearch,
            tolerance: config.tolerance,
        },
    };
}

/**
 * Health tool definition for MCP
 */
export const healthTool: ToolDefinition = {
    name: "health",
    description: "Returns server health status including version, uptime, tool count, supported methods and defaults",
    inputSchema: {
        type: "object",
        properties: {},
    },
};
