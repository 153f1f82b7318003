import { Order, OrderId } from '../domain/models';
import { OrderPriority, OrderStatus } from '../domain/enums';

/**
 * User whose pending orders are processed
 */
export type UserId = number;

/**
 * Storage adapter interface - abstracts all order persistence
 *
 * Implementations must reject with PersistenceError for faults the pipeline
 * may absorb per order; any other rejection aborts the whole batch.
 */
export interface OrderStorageAdapter {
  /**
   * Load the user's pending orders, freshly constructed (status NEW, priority LOW)
   */
  fetchOrdersForUser(userId: UserId): Promise<Order[]>;

  /**
   * Persist the outcome of processing one order
   */
  updateStatus(
    orderId: OrderId,
    status: OrderStatus,
    priority: OrderPriority,
  ): Promise<void>;

  /**
   * Check if storage is healthy and accessible
   */
  isHealthy(): Promise<boolean>;

  /**
   * Release connections; called on module shutdown for adapters the module created
   */
  close?(): Promise<void>;
}

/**
 * Persistence-specific storage fault
 */
export class PersistenceError extends Error {
  constructor(
    message: string,
    public code: string,
    public orderId?: OrderId,
    public cause?: Error,
  ) {
    super(message);
    this.name = 'PersistenceError';
  }
}
