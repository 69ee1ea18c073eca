import { z } from 'zod';
import { PAYMENT_METHODS } from '@domain/value-objects';

/**
 * Environment variables schema using Zod.
 *
 * This schema validates and transforms environment variables at startup,
 * ensuring all required values are present and correctly typed.
 */
export const envSchema = z.object({
  // Application
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  // Logging (pino levels)
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),

  // Payments
  PAYMENT_DEFAULT_METHOD: z.enum(PAYMENT_METHODS).default('credit_card'),
});

/**
 * Inferred TypeScript type from the env schema.
 * Use this for type-safe access to environment variables.
 */
export type EnvConfig = z.infer<typeof envSchema>;

/**
 * Validates environment variables using Zod schema.
 *
 * This function is used by NestJS ConfigModule.forRoot() to validate
 * and transform environment variables at application startup.
 *
 * @param config - Raw environment variables from process.env
 * @returns Validated and transformed configuration
 * @throws Error with detailed validation messages if validation fails
 */
export function validateEnv(config: Record<string, unknown>): EnvConfig {
  const result = envSchema.safeParse(config);

  if (!result.success) {
    const errors = result.error.issues
      .map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`)
      .join('\n');

    throw new Error(
      `\nEnvironment validation failed:\n${errors}\n\nPlease check your .env file or environment variables.`,
    );
  }

  return result.data;
}
