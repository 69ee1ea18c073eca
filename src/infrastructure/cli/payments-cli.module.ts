import { Module } from '@nestjs/common';
import { PaymentsModule } from '@infrastructure/payments';
import { SimulatePaymentCommand } from './simulate-payment.command';

@Module({
  imports: [PaymentsModule],
  providers: [SimulatePaymentCommand],
})
export class PaymentsCliModule {}
