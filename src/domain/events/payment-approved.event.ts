import { Money } from '../value-objects';
import { DomainEvent } from './domain-event';

export interface PaymentEventSnapshot {
  paymentId: string;
  orderId: string;
  amount: Money;
  transactionCode: string;
  occurredAt: Date;
}

/**
 * Recorded when a pending payment is confirmed by the gateway.
 */
export class PaymentApprovedEvent implements DomainEvent {
  static readonly EVENT_NAME = 'payment.approved';

  readonly eventName = PaymentApprovedEvent.EVENT_NAME;
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
