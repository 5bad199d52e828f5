/**
 * Environment Configuration
 *
 * Parsed once at boot. Invalid values stop startup with the offending
 * variable named.
 */

import { z } from 'zod';

const booleanFlag = z
    .enum(['true', 'false', '1', '0'])
    .transform((value) => value === 'true' || value === '1');

export const envSchema = z.object({
    PORT: z.coerce.number().int().min(0).max(65535).default(8080),
    HOST: z.string().min(1).default('0.0.0.0'),
    COLLECT_DEFAULT_METRICS: booleanFlag.default('true'),
});

export interface ServerConfig {
    port: number;
    host: string;
    collectDefaultMetrics: boolean;
}

export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigError';
    }
}

function describeIssues(error: z.ZodError): string {
    return error.issues
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
    const parsed = envSchema.safeParse(env);
    if (!parsed.success) {
        throw new ConfigError(`Invalid environment: ${describeIssues(parsed.error)}`);
    }

    return {
        port: parsed.data.PORT,
        host: parsed.data.HOST,
        collectDefaultMetrics: parsed.data.COLLECT_DEFAULT_METRICS,
    };
}

/**
 * Boot-time variant: reports a bad environment on stderr and exits with
 * status 1 instead of throwing.
 */
export function loadConfigOrExit(env: NodeJS.ProcessEnv = process.env): ServerConfig {
    try {
        return loadConfig(env);
    } catch (error) {
        if (error instanceof ConfigError) {
            console.error(`[Server] ${error.message}`);
            process.exit(1);
        }
        throw error;
    }
}

// ============================================================================
// Load Generator
// ============================================================================

export const loadEnvSchema = z.object({
    TARGET_URL: z.string().url().default('http://localhost:8080'),
    INTERVAL_MS: z.coerce.number().int().positive().default(500),
});

export interface LoadConfig {
    targetUrl: string;
    intervalMs: number;
}

export function loadLoadConfig(env: NodeJS.ProcessEnv = process.env): LoadConfig {
    const parsed = loadEnvSchema.safeParse(env);
    if (!parsed.success) {
        throw new ConfigError(`Invalid environment: ${describeIssues(parsed.error)}`);
    }

    return {
        targetUrl: parsed.data.TARGET_URL.replace(/\/+$/, ''),
        intervalMs: parsed.data.INTERVAL_MS,
    };
}
