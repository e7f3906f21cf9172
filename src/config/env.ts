/**
 * 🔒 ENVIRONMENT SETTINGS
 * Centralized .env with Zod validation. Every tunable for registry access lives here.
 */

import * as dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigurationError } from '../utils/errors';

dotenv.config();

const SettingsSchema = z
    .object({
        // 🗄️ Registry source
        REGISTRY_MODE: z.enum(['static', 'api']).default('static'),
        REGISTRY_DATA_PATH: z.string().optional(),
        REGISTRY_API_URL: z.string().url().optional(),
        REGISTRY_API_KEY: z.string().optional(),
        REGISTRY_API_SECRET: z.string().optional(),

        // ⏱️ Timeouts & retries
        REGISTRY_TIMEOUT_MS: z.coerce.number().int().min(100).max(60000).default(5000),
        REGISTRY_RETRIES: z.coerce.number().int().min(0).max(5).default(2),
        REGISTRY_RETRY_DELAY_MS: z.coerce.number().int().min(0).max(10000).default(300),

        // ⚙️ Concurrency & cache
        SEARCH_CONCURRENCY: z.coerce.number().int().min(1).max(16).default(4),
        CACHE_TTL_MS: z.coerce.number().int().min(0).default(60 * 60 * 1000),
        CACHE_MAX_ENTRIES: z.coerce.number().int().min(1).default(500),

        // 🏷️ Service identity
        LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
        SERVICE_NAME: z.string().default('mca-name-check'),
        NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    })
    .refine((s) => s.REGISTRY_MODE !== 'api' || s.REGISTRY_API_URL !== undefined, {
        message: 'REGISTRY_API_URL is required when REGISTRY_MODE=api',
        path: ['REGISTRY_API_URL'],
    });

export type Settings = z.infer<typeof SettingsSchema>;

/**
 * Parse and validate an environment. Throws instead of starting with a half-valid setup.
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
    const result = SettingsSchema.safeParse(env);

    if (!result.success) {
        const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
        throw new ConfigurationError(`Invalid environment: ${issues.join('; ')}`);
    }

    return result.data;
}
