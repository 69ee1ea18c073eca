import { Either, right } from '@domain/common';
import { Payment } from '@domain/entities';
import { DomainError } from '@domain/exceptions';
import { Money, PaymentId, PaymentMethod, PaymentStatus } from '@domain/value-objects';
import { PaymentRecord } from '../payment.record';

/**
 * Mapper for converting between the Payment entity and its stored record.
 * Dates are kept as ISO strings so a record never shares state with an entity.
 */
export class PaymentMapper {
  /**
   * Converts a stored record back to a Payment entity.
   * Fails when the record carries an ID, method or status the domain rejects.
   */
  static toDomain(record: PaymentRecord): Either<DomainError, Payment> {
    const id = PaymentId.parse(record.id);
    if (id.isLeft()) {
      return id;
    }
    const method = PaymentMethod.parse(record.method);
    if (method.isLeft()) {
      return method;
    }
    const status = PaymentStatus.parse(record.status);
    if (status.isLeft()) {
      return status;
    }

    return right(
      Payment.reconstitute({
        id: id.value,
        orderId: record.orderId,
        amount: Money.fromCents(record.amountCents),
        method: method.value,
        status: status.value,
        transactionCode: record.transactionCode,
        paidAt: record.paidAt ? new Date(record.paidAt) : null,
        updatedAt: record.updatedAt ? new Date(record.updatedAt) : null,
      }),
    );
  }

  /**
   * Converts a Payment entity to its stored record.
   */
  static toRecord(payment: Payment): PaymentRecord {
    return {
      id: payment.id.toString(),
      orderId: payment.orderId,
      amountCents: payment.amount.cents,
      method: payment.method.toString(),
      status: payment.status.toString(),
      transactionCode: payment.transactionCode,
      paidAt: payment.paidAt?.toISOString() ?? null,
      updatedAt: payment.updatedAt?.toISOString() ?? null,
    };
  }
}

