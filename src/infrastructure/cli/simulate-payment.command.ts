import { Inject } from '@nestjs/common';
import { Command, CommandRunner, Option } from 'nest-commander';
import { Either } from '@domain/common';
import { ApplicationError, PaymentRuleViolationError } from '@application/errors';
import { PaymentOutputDto } from '@application/dtos';
import { IManagePaymentPort } from '@application/ports';
import { EnvConfigService } from '@infrastructure/config';
import { AppLoggerService } from '@infrastructure/observability/logging';

export interface SimulatePaymentOptions {
  order?: string;
  amount?: number;
  method?: string;
  code?: string;
  localCode?: boolean;
  refuse?: boolean;
}

type StepResult = Either<ApplicationError, PaymentOutputDto>;

export function formatStep(step: string, result: StepResult): string {
  if (result.isLeft()) {
    return `✗ ${step}: ${result.value.message}`;
  }
  const payment = result.value;
  const paidAt = payment.paidAt ? payment.paidAt.toISOString() : 'never';
  return (
    `✓ ${step}: ${payment.paymentId} status=${payment.status} ` +
    `code=${payment.transactionCode ?? 'none'} paidAt=${paidAt}`
  );
}

@Command({
  name: 'simulate-payment',
  description: 'Create a payment in memory and drive it to authorized or refused',
})
export class SimulatePaymentCommand extends CommandRunner {
  constructor(
    @Inject('IManagePayment')
    private readonly payments: IManagePaymentPort,
    private readonly config: EnvConfigService,
    private readonly appLogger: AppLoggerService,
  ) {
    super();
  }

  async run(_passedParams: string[], options: SimulatePaymentOptions): Promise<void> {
    const created = this.report(
      'create',
      await this.payments.createPayment({
        orderId: options.order ?? 'order-cli',
        amount: options.amount ?? 100,
        method: options.method ?? this.config.defaultPaymentMethod.toString(),
      }),
    );
    if (!created) {
      return;
    }
    const paymentId = created.paymentId;

    if (options.localCode) {
      const assigned = this.report(
        'assign local code',
        await this.payments.assignLocalTransactionCode({ paymentId }),
      );
      if (!assigned) {
        return;
      }
    } else if (options.code !== undefined) {
      const defined = this.report(
        'define code',
        await this.payments.defineTransactionCode({ paymentId, transactionCode: options.code }),
      );
      if (!defined) {
        return;
      }
    }

    if (options.refuse) {
      this.report('refuse', await this.payments.refusePayment({ paymentId }));
    } else {
      this.report('confirm', await this.payments.confirmPayment({ paymentId }));
    }
  }

  @Option({
    flags: '-o, --order <orderId>',
    description: 'Order the payment belongs to',
  })
  parseOrder(value: string): string {
    return value;
  }

  @Option({
    flags: '-a, --amount <amount>',
    description: 'Amount to charge',
  })
  parseAmount(value: string): number {
    return Number.parseFloat(value);
  }

  @Option({
    flags: '-m, --method <method>',
    description: 'Payment method code (defaults to PAYMENT_DEFAULT_METHOD)',
  })
  parseMethod(value: string): string {
    return value;
  }

  @Option({
    flags: '-c, --code <transactionCode>',
    description: 'Transaction code issued by the gateway',
  })
  parseCode(value: string): string {
    return value;
  }

  @Option({
    flags: '-l, --local-code',
    description: 'Assign a LOCAL-<id> transaction code instead of a gateway one',
  })
  parseLocalCode(): boolean {
    return true;
  }

  @Option({
    flags: '-r, --refuse',
    description: 'Refuse the payment instead of confirming it',
  })
  parseRefuse(): boolean {
    return true;
  }

  // Prints the step; returns the payment when it succeeded
  private report(step: string, result: StepResult): PaymentOutputDto | null {
    // eslint-disable-next-line no-console
    console.log(formatStep(step, result));

    if (result.isLeft()) {
      const error = result.value;
      if (error instanceof PaymentRuleViolationError) {
        this.appLogger.logRuleViolation({ action: step, violations: error.violations });
      }
      process.exitCode = 1;
      return null;
    }
    return result.value;
  }
}
