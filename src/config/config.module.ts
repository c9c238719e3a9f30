import { Module, Global } from '@nestjs/common';
import { ConfigModule as NestConfigModule, ConfigService } from '@nestjs/config';
import { z } from 'zod';
import { MAX_LOAN_DAYS } from '../lending/dto/borrow.dto';

const booleanFlag = z
    .enum(['true', 'false', '1', '0'])
    .transform((value) => value === 'true' || value === '1');

// Zod schema for environment validation
export const envSchema = z.object({
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),

    // Storage
    LIBRARY_DATA_DIR: z.string().min(1).default('.'),
    LIBRARY_SEED: booleanFlag.default('true'),

    // Lending
    LOAN_PERIOD_DAYS: z.coerce.number().int().positive().max(MAX_LOAN_DAYS).default(14),
});

export type EnvConfig = z.infer<typeof envSchema>;

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
