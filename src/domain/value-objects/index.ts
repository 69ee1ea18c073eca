export { PaymentId } from './payment-id.vo';
export { PaymentMethod, PaymentMethodCode, PAYMENT_METHODS } from './payment-method.vo';
export { PaymentStatus, PaymentStatusCode, PAYMENT_STATUSES } from './payment-status.vo';
export { Money } from './money.vo';
