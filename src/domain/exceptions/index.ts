export {
  DomainError,
  DomainErrorGroup,
  DomainFailure,
  ErrorCode,
  containsErrorCode,
} from './domain.error';
export { joinErrors, failureCodes, failureList } from './join-errors';
export { PaymentErrors } from './payment.errors';
