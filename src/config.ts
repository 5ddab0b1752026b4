/**
 * Linked Accounts Store Configuration
 *
 * Type-safe environment variable loader
 *
 * Copyright (c) 2026 Rejourney
 *
 * Licensed under the Server Side Public License 1.0 (the "License");
 * you may not use this file except in compliance with the License.
 * See LICENSE-SSPL for full terms.
 */

import { z } from 'zod';
import dotenv from 'dotenv';
import path from 'path';
import fs from 'fs';

// =============================================================================
// Environment Variable Loading
// =============================================================================

/**
 * Load environment variables in priority order:
 * 1. Process environment (already set)
 * 2. .env.local (development and test only)
 * 3. .env
 */
function initializeEnv() {
    if (process.env.DOCKER_ENV === 'true') {
        return;
    }

    const envLocalPath = path.resolve(process.cwd(), '.env.local');
    const envPath = path.resolve(process.cwd(), '.env');

    if (process.env.NODE_ENV !== 'production' && fs.existsSync(envLocalPath)) {
        dotenv.config({ path: envLocalPath });
    }

    if (fs.existsSync(envPath)) {
        dotenv.config({ path: envPath });
    }
}

initializeEnv();

export const envSchema = z.object({
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

    // Database
    DATABASE_URL: z.string().min(1, 'DATABASE_URL is required'),
    DATABASE_POOL_MAX: z.coerce.number().int().positive().default(10),

    // Telegram id promoted to admin by the migrate script
    ADMIN_TELEGRAM_ID: z.coerce.number().int().positive().optional(),

    // Account limit applied when a user has no active plan
    FREE_PLAN_MAX_ACCOUNTS: z.coerce.number().int().positive().default(1),

    // Logging
    LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
});

export type Env = z.infer<typeof envSchema>;

function loadConfig(): Env {
    const result = envSchema.safeParse(process.env);

    if (!result.success) {
        console.error('❌ Invalid environment variables:');
        console.error(result.error.format());
        process.exit(1);
    }

    return result.data;
}

export const config = loadConfig();

// Derived config values
export const isDevelopment = config.NODE_ENV === 'development';
export const isProduction = config.NODE_ENV === 'production';
export const isTest = config.NODE_ENV === 'test';
