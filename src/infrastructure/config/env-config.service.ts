import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { must } from '@domain/common';
import { PaymentMethod } from '@domain/value-objects';
import { EnvConfig } from './env.validation';

/**
 * Typed configuration service for environment variables.
 *
 * Values are guaranteed to exist because they are validated at
 * application startup by the Zod schema.
 */
@Injectable()
export class EnvConfigService {
  constructor(private readonly configService: ConfigService<EnvConfig, true>) {}

  get nodeEnv(): EnvConfig['NODE_ENV'] {
    return this.configService.get('NODE_ENV', { infer: true });
  }

  get logLevel(): EnvConfig['LOG_LEVEL'] {
    return this.configService.get('LOG_LEVEL', { infer: true });
  }

  // The schema only admits known method codes, so parsing cannot fail here
  get defaultPaymentMethod(): PaymentMethod {
    return must(PaymentMethod.parse(this.configService.get('PAYMENT_DEFAULT_METHOD', { infer: true })));
  }

  get isDevelopment(): boolean {
    return this.nodeEnv === 'development';
  }
}
