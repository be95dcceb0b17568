import { config as loadEnv } from 'dotenv';
import { z } from 'zod';

// Load environment variables from .env file
loadEnv();

// Define the schema for environment variables
const envSchema = z.object({
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
    LOG_TO_FILE: z.enum(['true', 'false']).transform(val => val === 'true').default('true'),
    LOG_DIR: z.string().min(1).default('./logs'),

    // Monitor configuration file (markets, thresholds, sinks)
    MONITOR_CONFIG: z.string().min(1).default('config.json'),
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
