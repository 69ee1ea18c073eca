import { Either, left, right } from '../common';
import { DomainError, DomainFailure, PaymentErrors, joinErrors } from '../exceptions';
import { PaymentApprovedEvent, PaymentEvent, PaymentEventSnapshot, PaymentRefusedEvent } from '../events';
import { isAbsent, notAbsent, notBlank, positive } from '../guards';
import { Money, PaymentId, PaymentMethod, PaymentStatus } from '../value-objects';

export interface PaymentProps {
  id: PaymentId;
  orderId: string;
  amount: Money;
  method: PaymentMethod;
  status: PaymentStatus;
  transactionCode: string | null;
  paidAt: Date | null;
  updatedAt: Date | null;
}

/**
 * Entity representing a payment of an order.
 * Belongs to the Order aggregate, which it references by ID only.
 *
 * Lifecycle: pending → authorized | refused. A transaction code issued by the
 * gateway must be defined before the payment can be confirmed or refused.
 *
 * Operations return their failures instead of throwing. Every precondition of
 * an operation is evaluated and the failures are joined, and a failed
 * operation leaves the payment untouched.
 */
export class Payment {
  static readonly LOCAL_TRANSACTION_CODE_PREFIX = 'LOCAL';

  private _domainEvents: PaymentEvent[] = [];

  private constructor(
    public readonly id: PaymentId,
    public readonly orderId: string,
    public readonly amount: Money,
    public readonly method: PaymentMethod,
    private _status: PaymentStatus,
    private _transactionCode: string | null,
    private _paidAt: Date | null,
    private _updatedAt: Date | null,
  ) {}

  // Factory method: create new pending payment
  static create(
    orderId: string,
    amount: Money,
    method: PaymentMethod,
    id?: PaymentId,
  ): Either<DomainFailure, Payment> {
    const failure = joinErrors(
      notBlank(orderId, PaymentErrors.INVALID_ORDER_ID),
      // amounts under one cent round to zero and fail here
      positive(amount.cents, PaymentErrors.INVALID_AMOUNT),
    );
    if (failure) {
      return left(failure);
    }

    return right(
      new Payment(
        id ?? PaymentId.generate(),
        orderId,
        amount,
        method,
        PaymentStatus.pending(),
        null,
        null,
        null,
      ),
    );
  }

  // Factory method: reconstitute from persistence
  static reconstitute(props: PaymentProps): Payment {
    return new Payment(
      props.id,
      props.orderId,
      props.amount,
      props.method,
      props.status,
      props.transactionCode,
      props.paidAt,
      props.updatedAt,
    );
  }

  get status(): PaymentStatus {
    return this._status;
  }

  get transactionCode(): string | null {
    return this._transactionCode;
  }

  get paidAt(): Date | null {
    return this._paidAt;
  }

  get updatedAt(): Date | null {
    return this._updatedAt;
  }

  get domainEvents(): readonly PaymentEvent[] {
    return [...this._domainEvents];
  }

  /**
   * Assigns the code the payment gateway issued for this transaction.
   * Only allowed once, and only while the payment is pending.
   */
  defineTransactionCode(code: string): DomainFailure | null {
    const failure = joinErrors(
      this.checkPending(PaymentErrors.TRANSACTION_CODE_AFTER_COMPLETION),
      notBlank(code, PaymentErrors.INVALID_TRANSACTION_CODE),
      isAbsent(this._transactionCode, PaymentErrors.TRANSACTION_CODE_ALREADY_DEFINED),
    );
    if (failure) {
      return failure;
    }

    this._transactionCode = code;
    this.touch(new Date());
    return null;
  }

  /**
   * Defines a `LOCAL-<id>` code for payments settled without a gateway.
   * Does nothing when a code is already present.
   */
  defineLocalTransactionCode(): DomainFailure | null {
    if (this._transactionCode !== null) {
      return null;
    }
    return this.defineTransactionCode(`${Payment.LOCAL_TRANSACTION_CODE_PREFIX}-${this.id.toString()}`);
  }

  // Business logic: pending → authorized
  confirmPayment(): DomainFailure | null {
    return this.settle((now, snapshot) => {
      this._paidAt = now;
      this._status = PaymentStatus.authorized();
      return new PaymentApprovedEvent(snapshot);
    });
  }

  // Business logic: pending → refused
  refusePayment(): DomainFailure | null {
    return this.settle((_now, snapshot) => {
      this._status = PaymentStatus.refused();
      return new PaymentRefusedEvent(snapshot);
    });
  }

  /**
   * Returns the recorded events and forgets them.
   */
  pullDomainEvents(): PaymentEvent[] {
    const events = this._domainEvents;
    this._domainEvents = [];
    return events;
  }

  // Entity equality
  equals(other: Payment): boolean {
    return this.id.equals(other.id);
  }

  toSummary(): string {
    const code = this._transactionCode ?? 'none';
    return (
      `Payment ${this.id.toString()} for order ${this.orderId}: ` +
      `${this.amount.format()} via ${this.method.label()}, ` +
      `status ${this._status.label()}, transaction code ${code}`
    );
  }

  // Private helpers
  private settle(
    apply: (now: Date, snapshot: PaymentEventSnapshot) => PaymentEvent,
  ): DomainFailure | null {
    const transactionCode = this._transactionCode;
    const failure = joinErrors(
      this.checkPending(PaymentErrors.NOT_PENDING),
      notAbsent(transactionCode, PaymentErrors.TRANSACTION_CODE_NOT_DEFINED),
    );
    // a null code has already been reported by notAbsent
    if (failure || transactionCode === null) {
      return failure ?? PaymentErrors.TRANSACTION_CODE_NOT_DEFINED;
    }

    const now = new Date();
    const event = apply(now, {
      paymentId: this.id.toString(),
      orderId: this.orderId,
      amount: this.amount,
      transactionCode,
      occurredAt: now,
    });
    this.touch(now);
    this._domainEvents.push(event);
    return null;
  }

  private checkPending(failure: DomainError): DomainError | null {
    return this._status.isPending() ? null : failure;
  }

  private touch(now: Date): void {
    this._updatedAt = now;
  }
}
