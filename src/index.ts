/**
 * Order Pipeline
 *
 * Loads a user's pending orders, assigns each a status through its
 * type-specific handler and a priority from its amount, and persists the result.
 */

// Export all core components
export * from './core';

// Export testing utilities from _shared
export {
  MockOrderFactory,
  OrderScenarios,
} from './_shared/testing/mock-order-factory';
export type { OrderOptions } from './_shared/testing/mock-order-factory';

// Export adapters
export * from './adapters/storage/mock';
export * from './adapters/storage/typeorm';
export * from './adapters/classification/mock';
export * from './adapters/classification/http';
export * from './adapters/sinks/csv';
export * from './adapters/sinks/memory';

// Export NestJS module, services, controllers, configuration and tokens
export * from './modules/order-pipeline';

// Export DTOs and Swagger decorators
export * from './_shared/dto';
export * from './_shared/swagger/decorators';
