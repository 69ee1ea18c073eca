import { Logger } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import { ConfigModule } from '@infrastructure/config';
import { LoggerModule, AppLoggerService } from '@infrastructure/observability/logging';
import { PaymentsModule } from '@infrastructure/payments';
import { IManagePaymentPort, IPaymentRepositoryPort } from '@application/ports';
import { PaymentRuleViolationError } from '@application/errors';
import { PaymentId } from '@domain/value-objects';

describe('PaymentsModule Integration', () => {
  let module: TestingModule;
  let payments: IManagePaymentPort;
  let appLogger: AppLoggerService;

  beforeAll(async () => {
    module = await Test.createTestingModule({
      imports: [ConfigModule, LoggerModule, PaymentsModule],
    }).compile();

    payments = module.get<IManagePaymentPort>('IManagePayment');
    appLogger = module.get(AppLoggerService);
  });

  afterAll(async () => {
    await module.close();
  });

  beforeEach(() => {
    // the store logs through Nest's console logger, which LOG_LEVEL does not reach
    jest.spyOn(Logger.prototype, 'debug').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  const createPayment = async (): Promise<string> => {
    const created = await payments.createPayment({ orderId: 'order-int', amount: 80, method: 'pix' });
    if (created.isLeft()) {
      throw created.value;
    }
    return created.value.paymentId;
  };

  it('should drive a payment to authorized and log the approved event', async () => {
    const logSpy = jest.spyOn(appLogger, 'logPaymentEvent');
    const paymentId = await createPayment();

    const defined = await payments.defineTransactionCode({ paymentId, transactionCode: 'TXN-INT-1' });
    const confirmed = await payments.confirmPayment({ paymentId });

    expect(defined.isRight()).toBe(true);
    expect(confirmed.isRight()).toBe(true);
    if (confirmed.isRight()) {
      expect(confirmed.value.status).toBe('authorized');
      expect(confirmed.value.transactionCode).toBe('TXN-INT-1');
      expect(confirmed.value.paidAt).toBeInstanceOf(Date);
    }
    expect(logSpy).toHaveBeenCalledTimes(1);
    expect(logSpy.mock.calls[0][0].eventName).toBe('payment.approved');
    expect(logSpy.mock.calls[0][0].paymentId).toBe(paymentId);
    expect(logSpy.mock.calls[0][0].amount.cents).toBe(8000);
  });

  it('should persist the state between calls', async () => {
    const paymentId = await createPayment();
    await payments.assignLocalTransactionCode({ paymentId });
    await payments.refusePayment({ paymentId });

    const stored = await payments.getPayment(paymentId);

    expect(stored.isRight()).toBe(true);
    if (stored.isRight()) {
      expect(stored.value.status).toBe('refused');
      expect(stored.value.transactionCode).toBe(`LOCAL-${paymentId}`);
      expect(stored.value.isSettled).toBe(true);
    }
  });

  it('should keep a rejected operation from changing the stored payment', async () => {
    const logSpy = jest.spyOn(appLogger, 'logPaymentEvent');
    const paymentId = await createPayment();

    const confirmed = await payments.confirmPayment({ paymentId });

    expect(confirmed.isLeft()).toBe(true);
    if (confirmed.isLeft()) {
      expect(confirmed.value).toBeInstanceOf(PaymentRuleViolationError);
    }
    const stored = await payments.getPayment(paymentId);
    expect(stored.isRight() && stored.value.status).toBe('pending');
    expect(logSpy).not.toHaveBeenCalled();
  });

  it('should list the payments of an order through the repository', async () => {
    const repository = module.get<IPaymentRepositoryPort>('IPaymentRepository');
    const paymentId = await createPayment();

    const found = await repository.findByOrderId('order-int');

    expect(found.map((payment) => payment.id.toString())).toContain(paymentId);
    expect(await repository.findById(PaymentId.generate())).toBeNull();
  });
});
