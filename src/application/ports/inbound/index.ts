export * from './manage-payment.port';
