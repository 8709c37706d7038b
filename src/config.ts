/**
 * Trim configuration: defaults, validation and environment loading.
 *
 * Environment variables:
 * - CONTEXT_TRIM_TARGET_TOKENS  positive integer
 * - CONTEXT_TRIM_MIN_TURNS      non-negative integer
 * - CONTEXT_TRIM_PRIORITY_ROLES comma-separated roles
 * - CONTEXT_TRIM_MODEL          model name
 * - CONTEXT_TRIM_LOG_LEVEL      debug | info | warn | error | silent
 *
 * Unset or blank variables take the defaults. Malformed ones throw
 * `ConfigError`; `trim` itself clamps instead of throwing.
 */

import { z } from 'zod';
import type { ZodError } from 'zod';
import { ConfigError } from './lib/errors';
import type { EncodingRegistry } from './lib/encoding-registry';
import type { Logger } from './lib/logger';
import { LOG_LEVELS, consoleLogger, createFilteredLogger } from './lib/logger';
import type { TrimOptions } from './trim/trim';

export const trimConfigSchema = z.object({
    targetTokens: z.number().int().positive(),
    minTurns: z.number().int().min(0),
    priorityRoles: z.array(z.string().min(1)),
    model: z.string().min(1),
    logLevel: z.enum(LOG_LEVELS),
});

export type TrimConfig = z.infer<typeof trimConfigSchema>;

export const DEFAULT_TRIM_CONFIG: TrimConfig = {
    targetTokens: 4096,
    minTurns: 0,
    priorityRoles: [],
    model: 'gpt-4o',
    logLevel: 'silent',
};

const integerString = z
    .string()
    .regex(/^[+-]?\d+$/, 'Expected an integer')
    .transform(Number);

const roleList = z
    .string()
    .transform((value) => value.split(',').map((role) => role.trim()).filter((role) => role.length > 0));

const envSchema = z.object({
    CONTEXT_TRIM_TARGET_TOKENS: integerString.optional(),
    CONTEXT_TRIM_MIN_TURNS: integerString.optional(),
    CONTEXT_TRIM_PRIORITY_ROLES: roleList.optional(),
    CONTEXT_TRIM_MODEL: z.string().optional(),
    CONTEXT_TRIM_LOG_LEVEL: z.string().transform((value) => value.toLowerCase()).optional(),
});

type EnvKey = keyof z.infer<typeof envSchema>;

const ENV_KEYS: readonly EnvKey[] = [
    'CONTEXT_TRIM_TARGET_TOKENS',
    'CONTEXT_TRIM_MIN_TURNS',
    'CONTEXT_TRIM_PRIORITY_ROLES',
    'CONTEXT_TRIM_MODEL',
    'CONTEXT_TRIM_LOG_LEVEL',
];

function toConfigError(message: string, error: ZodError): ConfigError {
    return new ConfigError(
        message,
        error.issues.map((issue) => ({ path: issue.path, message: issue.message })),
    );
}

/**
 * Merge a partial config over the defaults and validate the result.
 */
export function parseTrimConfig(input: unknown = {}): TrimConfig {
    const partial = trimConfigSchema.partial().safeParse(input);
    if (!partial.success) {
        throw toConfigError('Invalid trim configuration', partial.error);
    }
    const data = partial.data;
    return {
        targetTokens: data.targetTokens ?? DEFAULT_TRIM_CONFIG.targetTokens,
        minTurns: data.minTurns ?? DEFAULT_TRIM_CONFIG.minTurns,
        priorityRoles: data.priorityRoles ?? [...DEFAULT_TRIM_CONFIG.priorityRoles],
        model: data.model ?? DEFAULT_TRIM_CONFIG.model,
        logLevel: data.logLevel ?? DEFAULT_TRIM_CONFIG.logLevel,
    };
}

/**
 * Read trim settings from environment variables.
 */
export function loadTrimConfigFromEnv(env: NodeJS.ProcessEnv = process.env): TrimConfig {
    const present: Partial<Record<EnvKey, string>> = {};
    for (const key of ENV_KEYS) {
        const value = env[key]?.trim();
        if (value) {
            present[key] = value;
        }
    }

    const parsed = envSchema.safeParse(present);
    if (!parsed.success) {
        throw toConfigError('Invalid trim environment', parsed.error);
    }

    const values = parsed.data;
    return parseTrimConfig({
        targetTokens: values.CONTEXT_TRIM_TARGET_TOKENS,
        minTurns: values.CONTEXT_TRIM_MIN_TURNS,
        priorityRoles: values.CONTEXT_TRIM_PRIORITY_ROLES,
        model: values.CONTEXT_TRIM_MODEL,
        logLevel: values.CONTEXT_TRIM_LOG_LEVEL,
    });
}

export interface TrimOptionsOverrides {
    /** Base logger, filtered at `config.logLevel` (default: consoleLogger) */
    logger?: Logger;
    registry?: EncodingRegistry;
}

/**
 * Turn a config into `trim` options.
 */
export function toTrimOptions(config: TrimConfig, overrides: TrimOptionsOverrides = {}): TrimOptions {
    return {
        targetTokens: config.targetTokens,
        model: config.model,
        minTurns: config.minTurns,
        priorityRoles: config.priorityRoles,
        registry: overrides.registry,
        logger: createFilteredLogger(overrides.logger ?? consoleLogger, config.logLevel),
    };
}
