// Adapters barrel export
export * from './persistence/in-memory';
export * from './events';
