/**
 * Healer configuration
 *
 * Only the size ceiling, the advisory time budget and the log level are
 * configurable. The indentation unit and the attempt cap are fixed so that
 * every run produces the same canonical layout.
 */

import { z } from 'zod';

import { ConfigValidationError } from '../utils/errors.js';

// ==========================================
// CONSTANTS
// ==========================================

/** Spaces per nesting level in canonical manifests */
export const INDENT_UNIT = 2;

/** Fix attempts allowed per document */
export const MAX_REPAIR_ATTEMPTS = 3;

export const BYTES_PER_MB = 1024 * 1024;

// ==========================================
// SCHEMA
// ==========================================

const LogLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']);

export const HealerConfigSchema = z.object({
    maxSizeMb: z.coerce.number().positive().default(10),
    timeoutS: z.coerce.number().positive().default(30),
    logLevel: LogLevelSchema.default('warn')
});

export type HealerConfig = z.infer<typeof HealerConfigSchema>;

export type HealerConfigInput = z.input<typeof HealerConfigSchema>;

/**
 * Build a validated configuration from explicit overrides and the environment.
 * Overrides win over environment variables.
 */
export function loadConfig(
    overrides: HealerConfigInput = {},
    env: NodeJS.ProcessEnv = process.env
): HealerConfig {
    const raw: Record<string, unknown> = {};
    if (env.HEALER_MAX_SIZE_MB) raw.maxSizeMb = env.HEALER_MAX_SIZE_MB;
    if (env.HEALER_TIMEOUT_S) raw.timeoutS = env.HEALER_TIMEOUT_S;
    if (env.HEALER_LOG_LEVEL) raw.logLevel = env.HEALER_LOG_LEVEL;

    for (const [key, value] of Object.entries(overrides)) {
        if (value !== undefined) raw[key] = value;
    }

    const parsed = HealerConfigSchema.safeParse(raw);
    if (!parsed.success) {
        throw new ConfigValidationError(
            parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
        );
    }
    return parsed.data;
}
