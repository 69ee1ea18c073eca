import { Injectable, Logger } from '@nestjs/common';
import { Payment } from '@domain/entities';
import { PaymentId } from '@domain/value-objects';
import { IPaymentRepositoryPort } from '@application/ports/outbound';
import { PaymentMapper } from './mappers';
import { PaymentRecord } from './payment.record';

/**
 * Process-local implementation of IPaymentRepositoryPort.
 *
 * Payments are kept as records and rebuilt on every read, so callers never
 * share an entity instance with the store. Contents are lost on exit.
 */
@Injectable()
export class InMemoryPaymentRepository implements IPaymentRepositoryPort {
  private readonly logger = new Logger(InMemoryPaymentRepository.name);
  private readonly records = new Map<string, PaymentRecord>();

  save(payment: Payment): Promise<void> {
    const record = PaymentMapper.toRecord(payment);
    this.records.set(record.id, record);
    this.logger.debug(`Saved payment ${record.id} (${record.status})`);
    return Promise.resolve();
  }

  findById(id: PaymentId): Promise<Payment | null> {
    const record = this.records.get(id.toString());
    return Promise.resolve(record ? this.restore(record) : null);
  }

  // Map iteration follows first insertion, i.e. creation order
  findByOrderId(orderId: string): Promise<Payment[]> {
    const payments = [...this.records.values()]
      .filter((record) => record.orderId === orderId)
      .map((record) => this.restore(record));
    return Promise.resolve(payments);
  }

  private restore(record: PaymentRecord): Payment {
    const restored = PaymentMapper.toDomain(record);
    if (restored.isLeft()) {
      throw new Error(`Stored payment '${record.id}' is corrupt: ${restored.value.toString()}`);
    }
    return restored.value;
  }
}
