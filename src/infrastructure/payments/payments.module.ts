import { Module } from '@nestjs/common';
import { EventsModule, InMemoryPersistenceModule } from '@infrastructure/adapters';
import { ManagePaymentUseCase } from '@application/use-cases';
import { IDomainEventPublisherPort, IPaymentRepositoryPort } from '@application/ports';

/**
 * Payments Module that wires the payment use case to its adapters.
 *
 * Exposes the use case under the 'IManagePayment' token so entry points
 * depend on IManagePaymentPort only.
 */
@Module({
  imports: [InMemoryPersistenceModule, EventsModule],
  providers: [
    {
      provide: 'IManagePayment',
      useFactory: (
        paymentRepository: IPaymentRepositoryPort,
        eventPublisher: IDomainEventPublisherPort,
      ): ManagePaymentUseCase => {
        return new ManagePaymentUseCase(paymentRepository, eventPublisher);
      },
      inject: ['IPaymentRepository', 'IDomainEventPublisher'],
    },
  ],
  exports: ['IManagePayment'],
})
export class PaymentsModule {}
