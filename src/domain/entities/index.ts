export { Payment, PaymentProps } from './payment.entity';
