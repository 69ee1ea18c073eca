export { PaymentMapper } from './payment.mapper';
