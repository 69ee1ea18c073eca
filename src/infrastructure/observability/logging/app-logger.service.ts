import { Injectable } from '@nestjs/common';
import { PinoLogger, InjectPinoLogger } from 'nestjs-pino';
import { PaymentEvent } from '@domain/events';

export interface LogContext {
  component?: string;
  paymentId?: string;
  orderId?: string;
  [key: string]: unknown;
}

/**
 * Structured logs for the payment context.
 */
@Injectable()
export class AppLoggerService {
  constructor(
    @InjectPinoLogger(AppLoggerService.name)
    private readonly logger: PinoLogger,
  ) {}

  /**
   * Logs a domain event handed to the publisher.
   */
  logPaymentEvent(event: PaymentEvent): void {
    const logData: LogContext = {
      component: 'payment',
      event: event.eventName,
      paymentId: event.paymentId,
      orderId: event.orderId,
      amountCents: event.amount.cents,
      transactionCode: event.transactionCode,
      occurredAt: event.occurredAt.toISOString(),
    };

    this.logger.info(logData, `Payment event ${event.eventName}: ${event.paymentId}`);
  }

  /**
   * Logs an operation the payment rules rejected.
   */
  logRuleViolation(context: { action: string; violations: string[]; paymentId?: string }): void {
    this.logger.warn(
      {
        component: 'payment',
        ...context,
      },
      `Payment rules rejected "${context.action}": ${context.violations.join(', ')}`,
    );
  }
}
