import { Module } from '@nestjs/common';
import { LoggingDomainEventPublisher } from './logging-domain-event.publisher';

/**
 * Module that binds the domain event publisher token.
 * Relies on the global LoggerModule for AppLoggerService.
 */
@Module({
  providers: [
    {
      provide: 'IDomainEventPublisher',
      useClass: LoggingDomainEventPublisher,
    },
  ],
  exports: ['IDomainEventPublisher'],
})
export class EventsModule {}
