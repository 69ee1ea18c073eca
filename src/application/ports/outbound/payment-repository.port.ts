import { Payment } from '@domain/entities';
import { PaymentId } from '@domain/value-objects';

export interface IPaymentRepositoryPort {
  /**
   * Stores a payment. If the payment already exists, it will be replaced.
   *
   * @param payment - The payment entity to save
   */
  save(payment: Payment): Promise<void>;

  /**
   * Retrieves a payment by its unique identifier.
   *
   * @param id - The payment's unique identifier
   * @returns Promise resolving to the payment if found, null otherwise
   */
  findById(id: PaymentId): Promise<Payment | null>;

  /**
   * Retrieves every payment attempted for an order, oldest first.
   *
   * @param orderId - The order the payments belong to
   * @returns Promise resolving to an array of payments (empty if none found)
   */
  findByOrderId(orderId: string): Promise<Payment[]>;
}
