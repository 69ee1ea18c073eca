import { Injectable, Logger } from '@nestjs/common';
import { DomainEvent, PaymentApprovedEvent, PaymentEvent, PaymentRefusedEvent } from '@domain/events';
import { IDomainEventPublisherPort } from '@application/ports/outbound';
import { AppLoggerService } from '@infrastructure/observability/logging';

/**
 * Publisher that records events in the log and delivers them nowhere.
 * Stands in until a message bus is chosen for payment events.
 */
@Injectable()
export class LoggingDomainEventPublisher implements IDomainEventPublisherPort {
  private readonly logger = new Logger(LoggingDomainEventPublisher.name);

  constructor(private readonly appLogger: AppLoggerService) {}

  publish(events: readonly DomainEvent[]): Promise<void> {
    for (const event of events) {
      if (isPaymentEvent(event)) {
        this.appLogger.logPaymentEvent(event);
      } else {
        this.logger.debug(`Event ${event.eventName} has no payment log format`);
      }
    }
    return Promise.resolve();
  }
}

function isPaymentEvent(event: DomainEvent): event is PaymentEvent {
  return event instanceof PaymentApprovedEvent || event instanceof PaymentRefusedEvent;
}
