import { Money } from '../value-objects';
import { DomainEvent } from './domain-event';
import { PaymentEventSnapshot } from './payment-approved.event';

/**
 * Recorded when a pending payment is declined by the gateway.
 */
export class PaymentRefusedEvent implements DomainEvent {
  static readonly EVENT_NAME = 'payment.refused';

  readonly eventName = PaymentRefusedEvent.EVENT_NAME;
  readonly paymentId: string;
  readonly orderId: string;
  readonly amount: Money;
  readonly transactionCode: string;
  readonly occurredAt: Date;

  constructor(snapshot: PaymentEventSnapshot) {
    this.paymentId = snapshot.paymentId;
    this.orderId = snapshot.orderId;
    this.amount = snapshot.amount;
    this.transactionCode = snapshot.transactionCode;
    this.occurredAt = snapshot.occurredAt;
    Object.freeze(this);
  }
}
