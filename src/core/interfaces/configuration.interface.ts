import { OrderId } from '../domain/models';
import { UserId } from './storage.adapter';

/**
 * Logger interface
 * Same shape as the NestJS LoggerService, so a Nest Logger can be passed in directly
 */
export interface Logger {
  error(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  log(message: string, ...args: unknown[]): void;
  debug(message: string, ...args: unknown[]): void;
  verbose(message: string, ...args: unknown[]): void;
}

/**
 * Console-backed logger used when no logger is configured
 */
export const consoleLogger: Logger = {
  error: (message, ...args) => console.error(message, ...args),
  warn: (message, ...args) => console.warn(message, ...args),
  log: (message, ...args) => console.log(message, ...args),
  debug: (message, ...args) => console.debug(message, ...args),
  verbose: (message, ...args) => console.debug(message, ...args),
};

/**
 * Lifecycle hooks for monitoring and metrics
 */
export interface LifecycleHooks {
  /**
   * Called once per order, after it has been persisted (or downgraded to db_error)
   */
  onOrderProcessed?: (event: OrderFateEvent) => void | Promise<void>;

  /**
   * Called when a fault aborts the batch, before it is rethrown
   */
  onError?: (error: Error, context: ErrorContext) => void | Promise<void>;
}

/**
 * Order fate event
 */
export interface OrderFateEvent {
  userId: UserId;
  orderId: OrderId;
  type: string | null;
  status: string;
  priority: string;
  latencyMs: number;

  /**
   * Fault that was absorbed into the status (export_failed, api_failure, db_error)
   */
  recoveredError?: Error;
}

/**
 * Error context
 */
export interface ErrorContext {
  operation: 'fetch-orders' | 'process-order';
  userId: UserId;
  orderId?: OrderId;
  stage?: string;
}
