/**
 * Centralized DTOs for the order pipeline API
 */

export * from './order.dto';
