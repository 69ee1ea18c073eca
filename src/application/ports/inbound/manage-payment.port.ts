import { Either } from '@domain/common';
import { ApplicationError } from '@application/errors';
import {
  CreatePaymentInputDto,
  DefineTransactionCodeInputDto,
  PaymentOutputDto,
  PaymentReferenceInputDto,
} from '@application/dtos';

export interface IManagePaymentPort {
  /**
   * Create a pending payment for an order.
   *
   * @param input - Order reference, amount and method code
   * @returns Either an error or the created payment
   */
  createPayment(input: CreatePaymentInputDto): Promise<Either<ApplicationError, PaymentOutputDto>>;

  /**
   * Record the transaction code issued by the payment gateway.
   */
  defineTransactionCode(
    input: DefineTransactionCodeInputDto,
  ): Promise<Either<ApplicationError, PaymentOutputDto>>;

  /**
   * Give a payment settled without a gateway its local transaction code.
   */
  assignLocalTransactionCode(
    input: PaymentReferenceInputDto,
  ): Promise<Either<ApplicationError, PaymentOutputDto>>;

  /**
   * Authorize a pending payment and publish the approval.
   */
  confirmPayment(input: PaymentReferenceInputDto): Promise<Either<ApplicationError, PaymentOutputDto>>;

  /**
   * Refuse a pending payment and publish the refusal.
   */
  refusePayment(input: PaymentReferenceInputDto): Promise<Either<ApplicationError, PaymentOutputDto>>;

  /**
   * Get a payment by ID.
   */
  getPayment(paymentId: string): Promise<Either<ApplicationError, PaymentOutputDto>>;
}
