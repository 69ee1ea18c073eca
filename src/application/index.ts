/**
 * APPLICATION LAYER
 *
 * Orchestrates the flow of data between the outside world and the domain.
 * Contains use cases that represent business operations.
 *
 * Contains:
 * - Use Cases: Application-specific business rules (ManagePaymentUseCase)
 * - Ports: Interfaces that define how the application communicates with the outside world
 *   - Inbound: How the outside world calls us (IManagePaymentPort)
 *   - Outbound: What we need from the outside (IPaymentRepositoryPort, IDomainEventPublisherPort)
 * - DTOs: Data Transfer Objects for use case input/output
 *
 * Rules:
 * - CAN import from domain layer
 * - CANNOT import from infrastructure layer
 * - Defines interfaces (ports) that infrastructure implements
 */

// Error types
export * from './errors';

// DTOs
export * from './dtos';

// Ports (interfaces)
export * from './ports';

// Use cases
export * from './use-cases';
