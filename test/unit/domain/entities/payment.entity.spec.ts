import { Payment } from '@domain/entities';
import { must } from '@domain/common';
import { PaymentApprovedEvent, PaymentRefusedEvent } from '@domain/events';
import { DomainErrorGroup, PaymentErrors, failureCodes } from '@domain/exceptions';
import { Money, PaymentId, PaymentMethod, PaymentStatus } from '@domain/value-objects';

describe('Payment', () => {
  const NOW = new Date('2024-05-01T10:00:00.000Z');
  const LATER = new Date('2024-05-01T10:05:00.000Z');
  const RAW_ID = '3f2b8c1e-9a4d-4e7f-8b6a-1c2d3e4f5a6b';

  // Helper functions to create payments in a known state
  const createValidPayment = (): Payment =>
    must(Payment.create('order-123', Money.fromDecimal(100.0), PaymentMethod.creditCard(), must(PaymentId.parse(RAW_ID))));

  const createPaymentWithCode = (): Payment => {
    const payment = createValidPayment();
    payment.defineTransactionCode('TXN-123');
    return payment;
  };

  beforeEach(() => {
    jest.useFakeTimers();
    jest.setSystemTime(NOW);
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  describe('creation', () => {
    it('should create a pending payment without code or dates', () => {
      const result = Payment.create('order-123', Money.fromDecimal(100.0), PaymentMethod.pix());

      expect(result.isRight()).toBe(true);
      if (result.isRight()) {
        const payment = result.value;
        expect(payment.orderId).toBe('order-123');
        expect(payment.amount.cents).toBe(10000);
        expect(payment.method.equals(PaymentMethod.pix())).toBe(true);
        expect(payment.status.isPending()).toBe(true);
        expect(payment.transactionCode).toBeNull();
        expect(payment.paidAt).toBeNull();
        expect(payment.updatedAt).toBeNull();
        expect(payment.domainEvents).toHaveLength(0);
      }
    });

    it('should generate an ID when none is given', () => {
      const first = must(Payment.create('order-123', Money.fromDecimal(10), PaymentMethod.cash()));
      const second = must(Payment.create('order-123', Money.fromDecimal(10), PaymentMethod.cash()));

      expect(first.equals(second)).toBe(false);
    });

    it('should keep a given ID', () => {
      expect(createValidPayment().id.toString()).toBe(RAW_ID);
    });

    it('should reject a blank order ID', () => {
      const result = Payment.create('   ', Money.fromDecimal(100.0), PaymentMethod.creditCard());

      expect(result.isLeft()).toBe(true);
      if (result.isLeft()) {
        expect(result.value).toBe(PaymentErrors.INVALID_ORDER_ID);
      }
    });

    it('should reject zero and negative amounts', () => {
      const zero = Payment.create('order-123', Money.fromDecimal(0), PaymentMethod.creditCard());
      const negative = Payment.create('order-123', Money.fromDecimal(-10), PaymentMethod.creditCard());

      expect(zero.isLeft() && zero.value === PaymentErrors.INVALID_AMOUNT).toBe(true);
      expect(negative.isLeft() && negative.value === PaymentErrors.INVALID_AMOUNT).toBe(true);
    });

    it('should reject amounts under one cent', () => {
      const result = Payment.create('order-123', Money.fromDecimal(0.001), PaymentMethod.cash());

      expect(result.isLeft()).toBe(true);
      if (result.isLeft()) {
        expect(result.value).toBe(PaymentErrors.INVALID_AMOUNT);
      }
    });

    it('should keep amounts in whole cents', () => {
      const payment = must(Payment.create('order-123', Money.fromDecimal(0.1 + 0.2), PaymentMethod.cash()));

      expect(payment.amount.cents).toBe(30);
      expect(payment.toSummary()).toContain(': 0.30 via Cash,');
    });

    it('should report every invalid input at once', () => {
      const result = Payment.create('', Money.fromDecimal(0), PaymentMethod.creditCard());

      expect(result.isLeft()).toBe(true);
      if (result.isLeft()) {
        expect(result.value).toBeInstanceOf(DomainErrorGroup);
        expect(failureCodes(result.value)).toEqual([
          PaymentErrors.INVALID_ORDER_ID.code,
          PaymentErrors.INVALID_AMOUNT.code,
        ]);
      }
    });
  });

  describe('reconstitution', () => {
    it('should restore every field as stored', () => {
      const id = PaymentId.generate();
      const payment = Payment.reconstitute({
        id,
        orderId: 'order-9',
        amount: Money.fromDecimal(42.5),
        method: PaymentMethod.bankSlip(),
        status: PaymentStatus.refunded(),
        transactionCode: 'TXN-9',
        paidAt: NOW,
        updatedAt: LATER,
      });

      expect(payment.id.equals(id)).toBe(true);
      expect(payment.status.equals(PaymentStatus.refunded())).toBe(true);
      expect(payment.transactionCode).toBe('TXN-9');
      expect(payment.paidAt).toEqual(NOW);
      expect(payment.updatedAt).toEqual(LATER);
      expect(payment.domainEvents).toHaveLength(0);
    });
  });

  describe('defineTransactionCode', () => {
    it('should define the code on a pending payment', () => {
      const payment = createValidPayment();

      const failure = payment.defineTransactionCode('TXN-123');

      expect(failure).toBeNull();
      expect(payment.transactionCode).toBe('TXN-123');
      expect(payment.updatedAt).toEqual(NOW);
      expect(payment.status.isPending()).toBe(true);
    });

    it('should reject a blank code', () => {
      const payment = createValidPayment();

      const failure = payment.defineTransactionCode('  ');

      expect(failure).toBe(PaymentErrors.INVALID_TRANSACTION_CODE);
      expect(payment.transactionCode).toBeNull();
      expect(payment.updatedAt).toBeNull();
    });

    it('should not overwrite a defined code', () => {
      const payment = createPaymentWithCode();

      const failure = payment.defineTransactionCode('TXN-456');

      expect(failure).toBe(PaymentErrors.TRANSACTION_CODE_ALREADY_DEFINED);
      expect(payment.transactionCode).toBe('TXN-123');
    });

    it('should report every violated rule after confirmation', () => {
      const payment = createPaymentWithCode();
      payment.confirmPayment();

      const failure = payment.defineTransactionCode('TXN-456');

      expect(failure).toBeInstanceOf(DomainErrorGroup);
      expect(failure && failureCodes(failure)).toEqual([
        PaymentErrors.TRANSACTION_CODE_AFTER_COMPLETION.code,
        PaymentErrors.TRANSACTION_CODE_ALREADY_DEFINED.code,
      ]);
      expect(payment.transactionCode).toBe('TXN-123');
    });

    it('should list failures in rule order', () => {
      const payment = createPaymentWithCode();
      payment.confirmPayment();

      const failure = payment.defineTransactionCode('');

      expect(failure && failureCodes(failure)).toEqual([
        PaymentErrors.TRANSACTION_CODE_AFTER_COMPLETION.code,
        PaymentErrors.INVALID_TRANSACTION_CODE.code,
        PaymentErrors.TRANSACTION_CODE_ALREADY_DEFINED.code,
      ]);
    });

    it('should reject any code after refusal', () => {
      const payment = createPaymentWithCode();
      payment.refusePayment();

      const failure = payment.defineTransactionCode('TXN-456');

      expect(PaymentErrors.TRANSACTION_CODE_AFTER_COMPLETION.matchesCode(failure)).toBe(true);
      expect(payment.transactionCode).toBe('TXN-123');
    });

    it('should reject a code on a refused payment that has none', () => {
      const payment = Payment.reconstitute({
        id: PaymentId.generate(),
        orderId: 'order-123',
        amount: Money.fromDecimal(10),
        method: PaymentMethod.cash(),
        status: PaymentStatus.refused(),
        transactionCode: null,
        paidAt: null,
        updatedAt: null,
      });

      expect(payment.defineTransactionCode('TXN-1')).toBe(PaymentErrors.TRANSACTION_CODE_AFTER_COMPLETION);
    });
  });

  describe('defineLocalTransactionCode', () => {
    it('should define a LOCAL code derived from the ID', () => {
      const payment = createValidPayment();

      const failure = payment.defineLocalTransactionCode();

      expect(failure).toBeNull();
      expect(payment.transactionCode).toBe(`LOCAL-${RAW_ID}`);
      expect(payment.updatedAt).toEqual(NOW);
    });

    it('should leave an existing code in place', () => {
      const payment = createPaymentWithCode();

      const failure = payment.defineLocalTransactionCode();

      expect(failure).toBeNull();
      expect(payment.transactionCode).toBe('TXN-123');
    });

    it('should fail once the payment is no longer pending', () => {
      const payment = Payment.reconstitute({
        id: PaymentId.generate(),
        orderId: 'order-123',
        amount: Money.fromDecimal(10),
        method: PaymentMethod.cash(),
        status: PaymentStatus.cancelled(),
        transactionCode: null,
        paidAt: null,
        updatedAt: null,
      });

      expect(payment.defineLocalTransactionCode()).toBe(PaymentErrors.TRANSACTION_CODE_AFTER_COMPLETION);
      expect(payment.transactionCode).toBeNull();
    });
  });

  describe('confirmPayment', () => {
    it('should authorize a pending payment with a code', () => {
      const payment = createPaymentWithCode();
      jest.setSystemTime(LATER);

      const failure = payment.confirmPayment();

      expect(failure).toBeNull();
      expect(payment.status.isAuthorized()).toBe(true);
      expect(payment.paidAt).toEqual(LATER);
      expect(payment.updatedAt).toEqual(LATER);
    });

    it('should record an approved event', () => {
      const payment = createPaymentWithCode();

      payment.confirmPayment();

      const events = payment.domainEvents;
      expect(events).toHaveLength(1);
      const event = events[0];
      expect(event).toBeInstanceOf(PaymentApprovedEvent);
      expect(event.eventName).toBe('payment.approved');
      expect(event.paymentId).toBe(RAW_ID);
      expect(event.orderId).toBe('order-123');
      expect(event.amount.equals(Money.fromDecimal(100.0))).toBe(true);
      expect(event.transactionCode).toBe('TXN-123');
      expect(event.occurredAt).toEqual(NOW);
    });

    it('should fail without a transaction code', () => {
      const payment = createValidPayment();

      const failure = payment.confirmPayment();

      expect(failure).toBe(PaymentErrors.TRANSACTION_CODE_NOT_DEFINED);
      expect(payment.status.isPending()).toBe(true);
      expect(payment.paidAt).toBeNull();
      expect(payment.domainEvents).toHaveLength(0);
    });

    it('should stamp the event with the transition time', () => {
      const payment = createPaymentWithCode();
      jest.setSystemTime(LATER);

      payment.confirmPayment();

      const [event] = payment.domainEvents;
      expect(event.occurredAt).toEqual(LATER);
      expect(event.occurredAt).toEqual(payment.paidAt);
      expect(event.occurredAt).toEqual(payment.updatedAt);
    });

    it('should not confirm twice', () => {
      const payment = createPaymentWithCode();
      payment.confirmPayment();
      jest.setSystemTime(LATER);

      const failure = payment.confirmPayment();

      expect(failure).toBe(PaymentErrors.NOT_PENDING);
      expect(payment.paidAt).toEqual(NOW);
      expect(payment.domainEvents).toHaveLength(1);
    });

    it('should not confirm a refused payment', () => {
      const payment = createPaymentWithCode();
      payment.refusePayment();

      expect(payment.confirmPayment()).toBe(PaymentErrors.NOT_PENDING);
      expect(payment.status.isRefused()).toBe(true);
      expect(payment.paidAt).toBeNull();
    });

    it('should report both failures for a stored payment without code', () => {
      const payment = Payment.reconstitute({
        id: PaymentId.generate(),
        orderId: 'order-123',
        amount: Money.fromDecimal(10),
        method: PaymentMethod.cash(),
        status: PaymentStatus.authorized(),
        transactionCode: null,
        paidAt: null,
        updatedAt: null,
      });

      const failure = payment.confirmPayment();

      expect(failure && failureCodes(failure)).toEqual([
        PaymentErrors.NOT_PENDING.code,
        PaymentErrors.TRANSACTION_CODE_NOT_DEFINED.code,
      ]);
    });
  });

  describe('refusePayment', () => {
    it('should refuse a pending payment with a code', () => {
      const payment = createPaymentWithCode();
      jest.setSystemTime(LATER);

      const failure = payment.refusePayment();

      expect(failure).toBeNull();
      expect(payment.status.isRefused()).toBe(true);
      expect(payment.paidAt).toBeNull();
      expect(payment.updatedAt).toEqual(LATER);
    });

    it('should record a refused event', () => {
      const payment = createPaymentWithCode();

      payment.refusePayment();

      const [event] = payment.domainEvents;
      expect(event).toBeInstanceOf(PaymentRefusedEvent);
      expect(event.eventName).toBe('payment.refused');
      expect(event.transactionCode).toBe('TXN-123');
    });

    it('should fail without a transaction code', () => {
      const payment = createValidPayment();

      expect(payment.refusePayment()).toBe(PaymentErrors.TRANSACTION_CODE_NOT_DEFINED);
      expect(payment.status.isPending()).toBe(true);
    });

    it('should not refuse an authorized payment', () => {
      const payment = createPaymentWithCode();
      payment.confirmPayment();

      expect(payment.refusePayment()).toBe(PaymentErrors.NOT_PENDING);
      expect(payment.status.isAuthorized()).toBe(true);
    });
  });

  describe('domain events', () => {
    it('should hand out events once', () => {
      const payment = createPaymentWithCode();
      payment.confirmPayment();

      const pulled = payment.pullDomainEvents();

      expect(pulled).toHaveLength(1);
      expect(payment.pullDomainEvents()).toHaveLength(0);
      expect(payment.domainEvents).toHaveLength(0);
    });

    it('should not expose the internal list', () => {
      const payment = createPaymentWithCode();
      payment.confirmPayment();

      const copy = payment.domainEvents;
      payment.pullDomainEvents();

      expect(copy).toHaveLength(1);
    });

    it('should freeze recorded events', () => {
      const payment = createPaymentWithCode();
      payment.confirmPayment();

      expect(Object.isFrozen(payment.domainEvents[0])).toBe(true);
    });
  });

  describe('full lifecycle', () => {
    it('should go from creation to authorization', () => {
      const payment = must(Payment.create('order-777', Money.fromDecimal(59.9), PaymentMethod.debitCard()));

      expect(payment.confirmPayment()).toBe(PaymentErrors.TRANSACTION_CODE_NOT_DEFINED);
      expect(payment.defineTransactionCode('GW-0001')).toBeNull();
      jest.setSystemTime(LATER);
      expect(payment.confirmPayment()).toBeNull();

      expect(payment.status.isAuthorized()).toBe(true);
      expect(payment.transactionCode).toBe('GW-0001');
      expect(payment.paidAt).toEqual(LATER);
      expect(payment.pullDomainEvents().map((event) => event.eventName)).toEqual(['payment.approved']);
    });
  });

  describe('equality and summary', () => {
    it('should compare payments by ID', () => {
      const payment = createValidPayment();
      const sameId = must(Payment.create('order-other', Money.fromDecimal(5), PaymentMethod.cash(), payment.id));

      expect(payment.equals(sameId)).toBe(true);
      expect(payment.equals(must(Payment.create('order-123', Money.fromDecimal(100), PaymentMethod.creditCard())))).toBe(false);
    });

    it('should summarize the payment', () => {
      expect(createValidPayment().toSummary()).toBe(
        `Payment ${RAW_ID} for order order-123: 100.00 via Credit card, status Pending, transaction code none`,
      );
    });

    it('should include the code and status once settled', () => {
      const payment = createPaymentWithCode();
      payment.refusePayment();

      expect(payment.toSummary()).toBe(
        `Payment ${RAW_ID} for order order-123: 100.00 via Credit card, status Refused, transaction code TXN-123`,
      );
    });
  });
});
