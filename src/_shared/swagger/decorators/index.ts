/**
 * Centralized Swagger decorators for the order pipeline API
 */

export * from './order.decorators';
export * from './health.decorators';
