/**
 * DOMAIN LAYER
 *
 * Business logic of the payment context, free of frameworks and I/O.
 *
 * Contains:
 * - Entities: Payment, with its pending → authorized | refused lifecycle
 * - Value Objects: PaymentId, PaymentMethod, PaymentStatus
 * - Events: facts recorded by entities (PaymentApproved, PaymentRefused)
 * - Exceptions: coded DomainErrors and their sentinels
 * - Guards: validation predicates returning a DomainError or null
 *
 * Rules:
 * - NO imports from application or infrastructure layers
 * - NO framework imports
 * - Failures are returned as values, never thrown
 */

export * from './common';
export * from './entities';
export * from './events';
export * from './exceptions';
export * from './guards';
export * from './value-objects';
