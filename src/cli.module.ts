import { Module } from '@nestjs/common';
import { ConfigModule } from '@infrastructure/config';
import { LoggerModule } from '@infrastructure/observability/logging';
import { PaymentsCliModule } from '@infrastructure/cli';

/**
 * Module for CLI commands.
 *
 * This module is used as the entry point for nest-commander. Payments live
 * in the process-local store, so each run starts empty.
 */
@Module({
  imports: [ConfigModule, LoggerModule, PaymentsCliModule],
})
export class CliModule {}
