import { PaymentApprovedEvent } from './payment-approved.event';
import { PaymentRefusedEvent } from './payment-refused.event';

export { DomainEvent } from './domain-event';
export { PaymentApprovedEvent, PaymentEventSnapshot } from './payment-approved.event';
export { PaymentRefusedEvent } from './payment-refused.event';

export type PaymentEvent = PaymentApprovedEvent | PaymentRefusedEvent;
