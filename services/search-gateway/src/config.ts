import fs from "fs";
import { z } from "zod";

export const DEFAULT_NEWSAPI_BASE_URL = "https://newsapi.org/v2/everything";
const SECRETS_DIR = "/run/secrets/";

// -------------------------------------------------
// Env schema
// -------------------------------------------------
const envSchema = z.object({
    NEWSAPI_KEY: z.string().trim().optional(),
    NEWSAPI_BASE_URL: z.string().url().default(DEFAULT_NEWSAPI_BASE_URL),
    SERVER_PORT: z.string().regex(/^\d+$/).default("8000"),
    CORS_ORIGIN: z.string().min(1).default("*"),
    NODE_ENV: z.enum(["development", "production", "test"]).default("production"),
});

/**
 * Process configuration, built once at startup and handed to the
 * client and gateway. `newsApiKey` stays optional here: the server
 * entry refuses to start without it, but every request still checks.
 */
export interface GatewayConfig {
    newsApiKey: string | undefined;
    newsApiBaseUrl: string;
    port: number;
    corsOrigin: string;
    nodeEnv: "development" | "production" | "test";
}

/**
 * Docker secrets are mounted as files; a value pointing into the
 * secrets directory is replaced by the file content.
 */
export function resolveSecret(value: string | undefined): string | undefined {
    if (!value) return undefined;
    if (value.startsWith(SECRETS_DIR)) {
        const secret = fs.readFileSync(value, "utf8").trim();
        return secret || undefined;
    }
    return value;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): GatewayConfig {
    const parsed = envSchema.parse(env);

    return {
        newsApiKey: resolveSecret(parsed.NEWSAPI_KEY),
        newsApiBaseUrl: parsed.NEWSAPI_BASE_URL,
        port: Number(parsed.SERVER_PORT),
        corsOrigin: parsed.CORS_ORIGIN,
        nodeEnv: parsed.NODE_ENV,
    };
}
