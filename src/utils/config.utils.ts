import { z } from 'zod';
import dotenv from 'dotenv';
import { ConfigurationError } from '@E/ConfigurationError';
import { LogLevel } from '@I/logger.interfaces';
import { parseLogLevel } from './logger.utils';

dotenv.config();

const csv = (value: string | undefined): string[] =>
    (value ?? '')
        .split(',')
        .map((item) => item.trim())
        .filter((item) => item.length > 0);

export const AppConfigSchema = z.object({
    serverUrl: z.string().url(),
    registryUrl: z.string().url(),
    databasePath: z.string().min(1),
    packages: z.array(z.string().min(1)),
    ignoredDependencies: z.array(z.string()),
    unsupportedPackages: z.object({
        '2': z.array(z.string()),
        '3': z.array(z.string()),
    }),
    requestTimeout: z.number().int().positive(),
    maxWorkers: z.number().int().positive().max(800),
    logLevel: z.nativeEnum(LogLevel),
    logDirectory: z.string().min(1),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;

/**
 * Configuration read from the process environment (and .env)
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): AppConfig {
    return {
        serverUrl: env.COMPAT_SERVER_URL || 'http://localhost:8888',
        registryUrl: env.COMPAT_REGISTRY_URL || 'https://pypi.org/pypi',
        databasePath: env.COMPAT_DB_PATH || './compatibility_data.db',
        packages: csv(env.COMPAT_PACKAGES),
        ignoredDependencies: csv(env.COMPAT_IGNORED_DEPENDENCIES),
        unsupportedPackages: {
            '2': csv(env.COMPAT_PY2_UNSUPPORTED),
            '3': csv(env.COMPAT_PY3_UNSUPPORTED),
        },
        requestTimeout: parseInt(env.COMPAT_REQUEST_TIMEOUT || '30000', 10),
        maxWorkers: parseInt(env.COMPAT_MAX_WORKERS || '20', 10),
        logLevel: parseLogLevel(env.LOG_LEVEL),
        logDirectory: env.LOG_DIRECTORY || '../../logs',
    };
}

/**
 * Merge overrides onto the environment configuration and validate the result
 */
export function loadConfig(overrides: Partial<AppConfig> = {}, env: NodeJS.ProcessEnv = process.env): AppConfig {
    const merged = { ...configFromEnv(env), ...overrides };
    const parsed = AppConfigSchema.safeParse(merged);

    if (!parsed.success) {
        const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
        throw new ConfigurationError(`Invalid configuration: ${issues.join('; ')}`, issues);
    }

    return parsed.data;
}
