/**
 * Order Pipeline Core - pure business logic, storage and service agnostic
 */

// Domain models
export * from './domain/models';
export * from './domain/enums';

// Interfaces and contracts
export * from './interfaces';

// Type dispatch and status rules
export * from './state-machine';

// Order processing pipeline
export * from './pipeline';
