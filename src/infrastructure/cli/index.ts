export { PaymentsCliModule } from './payments-cli.module';
export { SimulatePaymentCommand, SimulatePaymentOptions, formatStep } from './simulate-payment.command';
