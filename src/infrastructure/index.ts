/**
 * INFRASTRUCTURE LAYER
 *
 * Contains all external implementations and framework-specific code.
 * This layer adapts external tools to work with our application.
 *
 * Contains:
 * - Adapters: Implementations of application ports
 *   - Persistence: process-local payment store
 *   - Events: log-only domain event publisher
 * - Payments: NestJS wiring of the payment use case
 * - CLI: nest-commander commands
 * - Config and observability: validated env, pino logging
 *
 * Rules:
 * - CAN import from domain and application layers
 * - Implements interfaces defined in application/ports
 * - Contains all framework-specific code (NestJS, nest-commander, pino)
 */

export * from './adapters';
export * from './config';
export * from './observability/logging';
export * from './payments';
export * from './cli';
