import { Inject, Injectable, Logger } from '@nestjs/common';
import { Either, left, right } from '@domain/common';
import { Payment } from '@domain/entities';
import { DomainEvent } from '@domain/events';
import { DomainFailure } from '@domain/exceptions';
import { Money, PaymentId, PaymentMethod } from '@domain/value-objects';
import {
  ApplicationError,
  PaymentNotFoundError,
  PaymentRuleViolationError,
  UnexpectedError,
  ValidationError,
} from '@application/errors';
import {
  CreatePaymentInputDto,
  DefineTransactionCodeInputDto,
  PaymentOutputDto,
  PaymentReferenceInputDto,
} from '@application/dtos';
import { IManagePaymentPort } from '@application/ports/inbound';
import { IDomainEventPublisherPort, IPaymentRepositoryPort } from '@application/ports/outbound';

/**
 * ManagePaymentUseCase drives payments through their lifecycle.
 *
 * Each mutation loads the payment, applies one entity operation, saves the
 * result and then hands the events the entity recorded to the publisher.
 * Rule violations reported by the entity come back as
 * PaymentRuleViolationError and nothing is saved or published.
 *
 * Once the save has succeeded the operation succeeds: a publisher failure is
 * logged and does not turn a stored change into an error.
 */
@Injectable()
export class ManagePaymentUseCase implements IManagePaymentPort {
  private readonly logger = new Logger(ManagePaymentUseCase.name);

  constructor(
    @Inject('IPaymentRepository')
    private readonly paymentRepository: IPaymentRepositoryPort,
    @Inject('IDomainEventPublisher')
    private readonly eventPublisher: IDomainEventPublisherPort,
  ) {}

  async createPayment(
    input: CreatePaymentInputDto,
  ): Promise<Either<ApplicationError, PaymentOutputDto>> {
    try {
      const method = PaymentMethod.parse(input.method);
      if (method.isLeft()) {
        return left(new ValidationError(method.value.toString(), 'method'));
      }

      const created = Payment.create(input.orderId, Money.fromDecimal(input.amount), method.value);
      if (created.isLeft()) {
        return left(new PaymentRuleViolationError(created.value, 'create payment'));
      }

      const payment = created.value;
      await this.paymentRepository.save(payment);

      return right(this.mapToOutput(payment));
    } catch (error) {
      return left(this.unexpected(error));
    }
  }

  async defineTransactionCode(
    input: DefineTransactionCodeInputDto,
  ): Promise<Either<ApplicationError, PaymentOutputDto>> {
    return this.mutate(input.paymentId, 'define transaction code of', (payment) =>
      payment.defineTransactionCode(input.transactionCode),
    );
  }

  async assignLocalTransactionCode(
    input: PaymentReferenceInputDto,
  ): Promise<Either<ApplicationError, PaymentOutputDto>> {
    return this.mutate(input.paymentId, 'assign local transaction code to', (payment) =>
      payment.defineLocalTransactionCode(),
    );
  }

  async confirmPayment(
    input: PaymentReferenceInputDto,
  ): Promise<Either<ApplicationError, PaymentOutputDto>> {
    return this.mutate(input.paymentId, 'confirm', (payment) => payment.confirmPayment());
  }

  async refusePayment(
    input: PaymentReferenceInputDto,
  ): Promise<Either<ApplicationError, PaymentOutputDto>> {
    return this.mutate(input.paymentId, 'refuse', (payment) => payment.refusePayment());
  }

  async getPayment(paymentId: string): Promise<Either<ApplicationError, PaymentOutputDto>> {
    try {
      const payment = await this.findPayment(paymentId);
      if (!payment) {
        return left(new PaymentNotFoundError(paymentId));
      }

      return right(this.mapToOutput(payment));
    } catch (error) {
      return left(this.unexpected(error));
    }
  }

  // ============ Private Helper Methods ============

  private async mutate(
    paymentId: string,
    action: string,
    operation: (payment: Payment) => DomainFailure | null,
  ): Promise<Either<ApplicationError, PaymentOutputDto>> {
    try {
      const payment = await this.findPayment(paymentId);
      if (!payment) {
        return left(new PaymentNotFoundError(paymentId));
      }

      const failure = operation(payment);
      if (failure) {
        return left(new PaymentRuleViolationError(failure, `${action} payment '${paymentId}'`));
      }

      await this.paymentRepository.save(payment);

      await this.publishEvents(paymentId, payment.pullDomainEvents());

      return right(this.mapToOutput(payment));
    } catch (error) {
      return left(this.unexpected(error));
    }
  }

  private async publishEvents(paymentId: string, events: readonly DomainEvent[]): Promise<void> {
    if (events.length === 0) {
      return;
    }
    try {
      await this.eventPublisher.publish(events);
    } catch (error) {
      const names = events.map((event) => event.eventName).join(', ');
      const reason = error instanceof Error ? error.message : String(error);
      this.logger.error(`Failed to publish ${names} for payment '${paymentId}': ${reason}`);
    }
  }

  // Malformed IDs cannot belong to any payment
  private async findPayment(paymentId: string): Promise<Payment | null> {
    const id = PaymentId.parse(paymentId);
    if (id.isLeft()) {
      return null;
    }
    return this.paymentRepository.findById(id.value);
  }

  private unexpected(error: unknown): UnexpectedError {
    const message = error instanceof Error ? error.message : 'Unknown error';
    return new UnexpectedError(message);
  }

  private mapToOutput(payment: Payment): PaymentOutputDto {
    return {
      paymentId: payment.id.toString(),
      orderId: payment.orderId,
      amount: payment.amount.decimal,
      amountCents: payment.amount.cents,
      method: payment.method.toString(),
      status: payment.status.toString(),
      transactionCode: payment.transactionCode,
      paidAt: payment.paidAt,
      updatedAt: payment.updatedAt,
      isSettled: payment.status.isTerminal(),
    };
  }
}
