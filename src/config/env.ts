import { config as loadEnv } from 'dotenv';
import { z } from 'zod';

// Load environment variables from .env file
loadEnv();

const currencyCode = z.string().regex(/^[A-Z]{3}$/, 'Expected a 3-letter uppercase currency code');

// Define the schema for environment variables
const envSchema = z.object({
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
    LOG_TO_FILE: z.enum(['true', 'false']).transform(val => val === 'true').default('true'),
    LOG_DIR: z.string().min(1).default('./logs'),

    // Forex provider subscription (UDP)
    FX_PROVIDER_HOST: z.string().default('localhost'),
    FX_PROVIDER_PORT: z.coerce.number().int().min(1).max(65535).default(10203),
    FX_LISTEN_HOST: z.string().ip({ version: 'v4' }).default('127.0.0.1'),
    FX_LISTEN_PORT: z.coerce.number().int().min(1).max(65535).default(10000),
    FX_BUFFER_SIZE: z.coerce.number().int().positive().finite().default(4096),
    FX_IDLE_TIMEOUT_MS: z.coerce.number().int().positive().finite().default(10000),
    FX_SHUTDOWN_GRACE_MS: z.coerce.number().int().positive().finite().default(10000),
    FX_SUBSCRIPTION_MS: z.coerce.number().int().positive().finite().default(600000),

    // Local publisher script
    FX_PUBLISH_INTERVAL_MS: z.coerce.number().int().positive().finite().default(500),
    FX_PUBLISH_ARB_EVERY: z.coerce.number().int().positive().finite().default(10),

    // Arbitrage detection
    ARB_ANCHOR_CURRENCY: currencyCode.default('USD'),
    ARB_QUOTE_EXPIRY_MS: z.coerce.number().int().positive().finite().default(1500),
    ARB_STARTING_AMOUNT: z.coerce.number().positive().finite().default(100),
});

// Parse and validate environment variables
function validateEnv() {
    try {
        return envSchema.parse(process.env);
    } catch (error) {
        if (error instanceof z.ZodError) {
            console.error('❌ Invalid environment variables:');
            error.errors.forEach(err => {
                console.error(`  - ${err.path.join('.')}: ${err.message}`);
            });
            process.exit(1);
        }
        throw error;
    }
}

// Export validated environment configuration
export const env = validateEnv();

export type Env = z.infer<typeof envSchema>;
