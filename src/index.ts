#!/usr/bin/env node
import { loadConfig } from "./config.js";
import { ChromaSeqServer } from "./server.js";

export { ChromaSeqServer } from "./server.js";

try {
    const server = new ChromaSeqServer(loadConfig());
    server.run().catch((error: unknown) => {
        console.error("[MCP Error]", error);
        process.exit(1);
    });
} catch (error) {
    console.error(error instanceof Error ? error.message : error);
    process.exit(1);
}
