/**
 * DTOs for payment use cases.
 */

export interface CreatePaymentInputDto {
  orderId: string;
  // decimal amount, rounded to whole cents
  amount: number;
  method: string;
}

export interface DefineTransactionCodeInputDto {
  paymentId: string;
  transactionCode: string;
}

// Used by confirm, refuse and local code assignment
export interface PaymentReferenceInputDto {
  paymentId: string;
}

export interface PaymentOutputDto {
  paymentId: string;
  orderId: string;
  amount: number;
  amountCents: number;
  method: string;
  status: string;
  transactionCode: string | null;
  paidAt: Date | null;
  updatedAt: Date | null;
  isSettled: boolean;
}
