export { ManagePaymentUseCase } from './manage-payment.use-case';
