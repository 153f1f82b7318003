/**
 * Order Processing Pipeline
 *
 * Each pending order of a user passes three stages:
 * 1. Type Dispatch - CSV export (A), remote classification (B), flag (C)
 * 2. Priority - high above 200, low otherwise
 * 3. Persist - save status and priority
 */

// Main processor
export { OrderProcessor } from './order-processor';

// Pipeline types
export * from './types';

// Individual stages and handlers (for testing or custom pipelines)
export { TypeDispatchStage } from './stages/type-dispatch.stage';
export type { TypeHandlers } from './stages/type-dispatch.stage';
export { PriorityStage } from './stages/priority.stage';
export { PersistStage } from './stages/persist.stage';
export * from './handlers';
