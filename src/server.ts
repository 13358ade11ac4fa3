import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";
import {
    CallToolRequestSchema,
    ErrorCode,
    ListToolsRequestSchema,
    McpError,
} from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import { loadConfig, type ServerConfig } from "./config.js";
import { getVersion } from "./tools/health.js";
import { runTool, tools, UnknownToolError } from "./tools/index.js";

function isTestEnvironment(): boolean {
    return process.env.NODE_ENV === "test" || typeof process.env.VITEST !== "undefined";
}

/**
 * ChromaSeq MCP Server
 * Deterministic, invertible color sequences
 */
export class ChromaSeqServer {
    private server: Server;
    private config: ServerConfig;

    constructor(config: ServerConfig = loadConfig()) {
        this.config = config;
        this.server = new Server(
            {
                name: "chromaseq-mcp",
                version: getVersion(),
            },
            {
                capabilities: {
                    tools: {},
                },
            }
        );

        this.setupToolHandlers();

        // Error handling
        this.server.onerror = (error) => console.error("[MCP Error]", error);

        // Only set up SIGINT handler if not in test environment
        if (!isTestEnvironment()) {
            process.on("SIGINT", () => {
                void this.server.close().then(
                    () => process.exit(0),
                    (error: unknown) => {
                        console.error("[MCP Error]", error);
                        process.exit(1);
                    }
                );
            });
        }
    }

    private setupToolHandlers() {
        this.server.setRequestHandler(ListToolsRequestSchema, async () => ({ tools }));

        this.server.setRequestHandler(CallToolRequestSchema, async (request) => {
            const toolName = request.params.name;

            let result: unknown;
            try {
                result = runTool(toolName, request.params.arguments ?? {}, this.config);
            } catch (error) {
                if (error instanceof z.ZodError) {
                    const issue = error.issues[0];
                    const where = issue && issue.path.length > 0 ? ` (${issue.path.join(".")})` : "";
                    throw new McpError(
                        ErrorCode.InvalidParams,
                        `Invalid parameters for ${toolName}${where}: ${issue?.message ?? "validation failed"}`
                    );
                }
                if (error instanceof UnknownToolError) {
                    throw new McpError(ErrorCode.MethodNotFound, error.message);
                }
                console.error("[MCP Error]", error);
                throw new McpError(
                    ErrorCode.InternalError,
                    `Failed to run ${toolName}: ${error instanceof Error ? error.message : "Unknown error"}`
                );
            }

            return {
                content: [
                    {
                        type: "text",
                        text: JSON.stringify(result, null, 2),
                    },
                ],
            };
        });
    }

    async run(transport?: Transport) {
        const serverTransport = transport ?? new StdioServerTransport();
        await this.server.connect(serverTransport);
        // Only log when using stdio transport and not in test environment
        if (!transport && !isTestEnvironment()) {
            console.error("ChromaSeq MCP server running on stdio");
        }
    }

    getServer(): Server {
        return this.server;
    }
}
