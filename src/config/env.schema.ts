import { z } from 'zod';

const logLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

const booleanFromString = (defaultValue: boolean) =>
    z.preprocess((value) => {
        if (typeof value === 'boolean') {
            return value;
        }
        if (typeof value === 'string') {
            const normalized = value.trim().toLowerCase();
            if (normalized === 'true' || normalized === '1') {
                return true;
            }
            if (normalized === 'false' || normalized === '0' || normalized === '') {
                return false;
            }
        }
        return value;
    }, z.boolean().default(defaultValue));

const nonNegativeIntWithDefault = (defaultValue: number) =>
    z.coerce.number().int().min(0).default(defaultValue);

const positiveIntWithDefault = (defaultValue: number) =>
    z.coerce.number().int().positive().default(defaultValue);

export const envSchema = z.object({
    // Cluster
    SEARCH_SERVERS: z.string().default(''),
    SEARCH_TRANSPORT: z.string().min(1).default('http'),
    SEARCH_TIMEOUT: positiveIntWithDefault(120000).refine((value) => value <= 600000, {
        message: 'SEARCH_TIMEOUT must be between 1 and 600000 milliseconds',
    }),
    SEARCH_MAX_REQUESTS: nonNegativeIntWithDefault(10000),
    SEARCH_NO_REFRESH: booleanFromString(false),
    SEARCH_DEFLATE: booleanFromString(false),

    // Debugging
    SEARCH_TRACE_CALLS: z.string().default(''),
    SEARCH_DEBUG: booleanFromString(false),

    // Logging
    LOG_LEVEL: logLevelSchema.default('info'),
});

export type LogLevel = z.infer<typeof logLevelSchema>;
