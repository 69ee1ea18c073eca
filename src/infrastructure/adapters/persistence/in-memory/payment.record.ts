/**
 * Flat, serializable shape a Payment is stored as.
 */
export interface PaymentRecord {
  id: string;
  orderId: string;
  amountCents: number;
  method: string;
  status: string;
  transactionCode: string | null;
  paidAt: string | null;
  updatedAt: string | null;
}
