export { InMemoryPersistenceModule } from './in-memory.module';
export { InMemoryPaymentRepository } from './in-memory-payment.repository';
export { PaymentMapper } from './mappers';
export { PaymentRecord } from './payment.record';
