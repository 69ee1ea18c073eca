import { Global, Module } from '@nestjs/common';
import { ConfigModule as NestConfigModule } from '@nestjs/config';
import { EnvConfigService } from './env-config.service';
import { validateEnv } from './env.validation';

/**
 * Global configuration module.
 *
 * Loads `.env.local` and `.env` when present, validates the result with the
 * Zod schema and exposes it through EnvConfigService. Startup aborts when
 * validation fails.
 */
@Global()
@Module({
  imports: [
    NestConfigModule.forRoot({
      isGlobal: true,
      envFilePath: ['.env.local', '.env'],
      validate: validateEnv,
    }),
  ],
  providers: [EnvConfigService],
  exports: [EnvConfigService],
})
export class ConfigModule {}
