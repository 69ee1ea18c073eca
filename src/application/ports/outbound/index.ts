export { IPaymentRepositoryPort } from './payment-repository.port';
export { IDomainEventPublisherPort } from './domain-event-publisher.port';
