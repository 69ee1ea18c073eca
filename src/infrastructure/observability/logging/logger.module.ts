import { Global, Module } from '@nestjs/common';
import { LoggerModule as PinoLoggerModule, Params } from 'nestjs-pino';
import { EnvConfigService } from '@infrastructure/config';
import { AppLoggerService } from './app-logger.service';

@Global()
@Module({
  imports: [
    PinoLoggerModule.forRootAsync({
      inject: [EnvConfigService],
      useFactory: (config: EnvConfigService): Params => ({
        pinoHttp: {
          level: config.logLevel,

          // Readable output in development, JSON everywhere else
          transport: config.isDevelopment
            ? {
                target: 'pino-pretty',
                options: {
                  colorize: true,
                  singleLine: false,
                  translateTime: 'SYS:standard',
                  ignore: 'pid,hostname',
                },
              }
            : undefined,

          base: { service: 'payments' },
        },
      }),
    }),
  ],
  providers: [AppLoggerService],
  exports: [PinoLoggerModule, AppLoggerService],
})
export class LoggerModule {}
