#!/usr/bin/env node
/**
 * Command-line access to the tools without an MCP client
 *
 *   chromaseq generate_colors '{"method":"plastic","count":5,"seed":42}'
 */

import { realpathSync } from "fs";
import { pathToFileURL } from "url";
import { z } from "zod";
import { loadConfig } from "./config.js";
import { runTool, tools, UnknownToolError } from "./tools/index.js";

export interface CliIO {
    out: (line: string) => void;
    err: (line: string) => void;
}

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

export function usage(): string {
    return [
        "Usage: chromaseq <tool> [json-arguments]",
        "",
        "Tools:",
        ...tools.map((tool) => `  ${tool.name.padEnd(18)} ${tool.description}`),
    ].join("\n");
}

function isFailure(result: unknown): boolean {
    return typeof result === "object" && result !== null && "ok" in result && result.ok === false;
}

/**
 * Runs one tool call and prints its JSON result
 * @param argv - Arguments after the program name
 * @returns Process exit code
 */
export function runCli(argv: string[], io: CliIO, env: NodeJS.ProcessEnv = process.env): number {
    if (argv.length === 1 && (argv[0] === "--help" || argv[0] === "-h")) {
        io.out(usage());
        return EXIT_OK;
    }
    if (argv.length < 1 || argv.length > 2) {
        io.err(usage());
        return EXIT_USAGE;
    }

    const [toolName, rawArgs] = argv;

    let args: unknown = {};
    if (rawArgs !== undefined) {
        try {
            args = JSON.parse(rawArgs);
        } catch (error) {
            io.err(`Invalid JSON arguments: ${error instanceof Error ? error.message : String(error)}`);
            return EXIT_FAILURE;
        }
    }

    try {
        const result = runTool(toolName, args, loadConfig(env));
        io.out(JSON.stringify(result, null, 2));
        return isFailure(result) ? EXIT_FAILURE : EXIT_OK;
    } catch (error) {
        if (error instanceof UnknownToolError) {
            io.err(`${error.message}. Available: ${tools.map((tool) => tool.name).join(", ")}`);
        } else if (error instanceof z.ZodError) {
            const issue = error.issues[0];
            io.err(`Invalid parameters for ${toolName}: ${issue?.path.join(".") ?? ""} ${issue?.message ?? ""}`.trim());
        } else {
            io.err(error instanceof Error ? error.message : String(error));
        }
        return EXIT_FAILURE;
    }
}

function isMain(): boolean {
    const entry = process.argv[1];
    if (entry === undefined) {
        return false;
    }
    try {
        return import.meta.url === pathToFileURL(realpathSync(entry)).href;
    } catch {
        return false;
    }
}

if (isMain()) {
    process.exitCode = runCli(process.argv.slice(2), {
        out: (line) => console.log(line),
        err: (line) => console.error(line),
    });
}
