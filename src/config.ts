/**
 * Server configuration, read from the environment
 */

import { z } from "zod";

export interface ServerConfig {
    /** Seed used when a request omits one */
    defaultSeed: number;
    maxSearch: number;
    tolerance: number;
    /** Upper bound on generated colors per request and on comparison sample size */
    maxCount: number;
    /** Upper bound on a request's max_search */
    searchLimit: number;
}

const envSchema = z.object({
    CHROMASEQ_DEFAULT_SEED: z.coerce.number().int().refine(Number.isSafeInteger).default(0),
    CHROMASEQ_MAX_SEARCH: z.coerce.number().int().nonnegative().default(10000),
    CHROMASEQ_TOLERANCE: z.coerce.number().positive().max(Math.sqrt(3)).default(0.01),
    CHROMASEQ_MAX_COUNT: z.coerce.number().int().positive().default(10000),
    CHROMASEQ_SEARCH_LIMIT: z.coerce.number().int().positive().default(1000000),
});

/**
 * Parses configuration from environment variables. Unset or empty variables
 * take their defaults.
 * @throws Error naming the offending variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
    const present = Object.fromEntries(
        Object.entries(env).filter(([key, value]) => key.startsWith("CHROMASEQ_") && value !== undefined && value !== "")
    );

    const parsed = envSchema.safeParse(present);
    if (!parsed.success) {
        const issue = parsed.error.issues[0];
        throw new Error(`Invalid configuration ${issue?.path.join(".") ?? ""}: ${issue?.message ?? "unknown error"}`);
    }

    const config: ServerConfig = {
        defaultSeed: parsed.data.CHROMASEQ_DEFAULT_SEED,
        maxSearch: parsed.data.CHROMASEQ_MAX_SEARCH,
        tolerance: parsed.data.CHROMASEQ_TOLERANCE,
        maxCount: parsed.data.CHROMASEQ_MAX_COUNT,
        searchLimit: parsed.data.CHROMASEQ_SEARCH_LIMIT,
    };

    if (config.maxSearch > config.searchLimit) {
        throw new Error(
            `Invalid configuration CHROMASEQ_MAX_SEARCH: ${config.maxSearch} exceeds CHROMASEQ_SEARCH_LIMIT ${config.searchLimit}`
        );
    }
    return config;
}
