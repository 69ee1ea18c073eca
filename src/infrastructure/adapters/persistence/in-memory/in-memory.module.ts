import { Module } from '@nestjs/common';
import { InMemoryPaymentRepository } from './in-memory-payment.repository';

/**
 * Module that provides the process-local payment store.
 *
 * @example
 * ```typescript
 * constructor(
 *   @Inject('IPaymentRepository')
 *   private readonly paymentRepository: IPaymentRepositoryPort,
 * ) {}
 * ```
 */
@Module({
  providers: [
    {
      provide: 'IPaymentRepository',
      useClass: InMemoryPaymentRepository,
    },
  ],
  exports: ['IPaymentRepository'],
})
export class InMemoryPersistenceModule {}
