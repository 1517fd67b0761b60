import { Module, Global } from '@nestjs/common';
import { ConfigModule as NestConfigModule, ConfigService } from '@nestjs/config';
import { z } from 'zod';

// Zod schema for environment validation
export const envSchema = z.object({
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    PORT: z.coerce.number().int().positive().default(3000),

    // DynamoDB
    DYNAMODB_ENDPOINT: z.string().url().optional(),
    AWS_REGION: z.string().default('us-east-1'),
    TABLE_PREFIX: z.string().default(''),

    // Auth
    JWT_ISSUER: z.string().default('http://localhost:3000'),
    JWT_SECRET: z.string().optional(),
    JWT_EXPIRES_IN_SECONDS: z.coerce.number().int().positive().default(3600),
    REFRESH_TOKEN_TTL_SECONDS: z.coerce.number().int().positive().default(7 * 24 * 60 * 60),
    MAX_SESSIONS_PER_USER: z.coerce.number().int().positive().default(5),

    // Rate limiting
    RATE_LIMIT_PER_MINUTE: z.coerce.number().int().positive().default(100),

    // Audit
    AUDIT_QUEUE_CAPACITY: z.coerce.number().int().positive().default(500),
    AUDIT_FLUSH_TIMEOUT_MS: z.coerce.number().int().nonnegative().default(5000),

    // Jobs
    JOB_RETENTION_DAYS: z.coerce.number().int().positive().default(7),

    // Logging
    LOKI_HOST: z.string().url().optional(),
}).refine(
    (env) => env.NODE_ENV !== 'production' || Boolean(env.JWT_SECRET),
    { message: 'JWT_SECRET must be set in production', path: ['JWT_SECRET'] },
);

export type EnvConfig = z.infer<typeof envSchema>;

/**
 * Validates raw environment variables, throwing on the first invalid set.
 */
export function validateEnv(config: Record<string, unknown>): EnvConfig {
    const result = envSchema.safeParse(config);
    if (!result.success) {
        console.error('Invalid environment configuration:');
        console.error(result.error.format());
        throw new Error('Invalid environment configuration');
    }
    return result.data;
}

@Global()
@Module({
    imports: [
        NestConfigModule.forRoot({
            envFilePath: ['.env.local', '.env'],
            validate: validateEnv,
        }),
    ],
    providers: [ConfigService],
    exports: [ConfigService],
})
export class ConfigModule { }
