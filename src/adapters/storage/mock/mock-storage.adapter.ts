import {
  OrderStorageAdapter,
  PersistenceError,
  Order,
  OrderId,
  OrderPriority,
  OrderStatus,
  UserId,
} from '../../../core';

/**
 * Order record as held by the mock store
 */
export interface StoredOrder {
  id: OrderId;
  userId: UserId;
  type: string | null;
  amount: number | null;
  flag: boolean | null;
  status: OrderStatus;
  priority: OrderPriority;
}

/**
 * Order data accepted by seedOrders(); id is generated when omitted
 */
export interface SeedOrder {
  id?: OrderId;
  type: string | null;
  amount?: number | null;
  flag?: boolean | null;
  status?: OrderStatus;
}

/**
 * Recorded updateStatus() call
 */
export interface UpdateCall {
  orderId: OrderId;
  status: OrderStatus;
  priority: OrderPriority;
}

/**
 * Mock storage adapter for testing
 * Provides in-memory storage with deterministic behavior and fault injection
 */
export class MockStorageAdapter implements OrderStorageAdapter {
  private orders: Map<string, StoredOrder> = new Map();

  // Fault injection
  private fetchFailure: Error | null = null;
  private updateFailures: Map<string, Error> = new Map();

  // Call recording
  private fetchCalls: UserId[] = [];
  private updateCalls: UpdateCall[] = [];

  // ID generation
  private idCounter = 0;
  private closed = false;

  constructor(private readonly options: MockStorageOptions = {}) {
    this.options = {
      simulateLatency: false,
      latencyMs: 10,
      throwOnError: false,
      ...options,
    };
  }

  /**
   * Simulate network latency if configured
   */
  private async simulateLatency(): Promise<void> {
    if (this.options.simulateLatency && this.options.latencyMs) {
      await new Promise((resolve) =>
        setTimeout(resolve, this.options.latencyMs),
      );
    }
  }

  private keyOf(orderId: OrderId): string | null {
    return orderId === null ? null : String(orderId);
  }

  // ==================== Order Operations ====================

  async fetchOrdersForUser(userId: UserId): Promise<Order[]> {
    await this.simulateLatency();
    this.fetchCalls.push(userId);

    if (this.fetchFailure) {
      const failure = this.fetchFailure;
      this.fetchFailure = null;
      throw failure;
    }

    return Array.from(this.orders.values())
      .filter(
        (record) =>
          record.userId === userId && record.status === OrderStatus.NEW,
      )
      .map(
        (record) =>
          new Order(record.id, record.type, record.amount, record.flag),
      );
  }

  async updateStatus(
    orderId: OrderId,
    status: OrderStatus,
    priority: OrderPriority,
  ): Promise<void> {
    await this.simulateLatency();
    this.updateCalls.push({ orderId, status, priority });

    const key = this.keyOf(orderId);
    if (key === null) {
      throw new PersistenceError(
        'Cannot update an order without an identifier',
        'MISSING_ORDER_ID',
        orderId,
      );
    }

    const failure = this.updateFailures.get(key);
    if (failure) {
      throw failure;
    }

    const record = this.orders.get(key);
    if (!record) {
      throw new PersistenceError(
        `Order not found: ${orderId}`,
        'ORDER_NOT_FOUND',
        orderId,
      );
    }

    record.status = status;
    record.priority = priority;
  }

  // ==================== Health & Monitoring ====================

  async isHealthy(): Promise<boolean> {
    await this.simulateLatency();
    return !this.options.throwOnError;
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  // ==================== Testing Utilities ====================

  /**
   * Add orders for a user, in the order they will be fetched
   */
  seedOrders(userId: UserId, orders: SeedOrder[]): StoredOrder[] {
    return orders.map((seed) => {
      const record: StoredOrder = {
        id: seed.id === undefined ? ++this.idCounter : seed.id,
        userId,
        type: seed.type,
        amount: seed.amount ?? null,
        flag: seed.flag ?? null,
        status: seed.status ?? OrderStatus.NEW,
        priority: OrderPriority.LOW,
      };

      const key =
        this.keyOf(record.id) ?? `anonymous-${this.orders.size + 1}`;
      this.orders.set(key, record);
      return record;
    });
  }

  /**
   * Make the next fetchOrdersForUser() call reject with the given error
   */
  failNextFetch(error: Error): void {
    this.fetchFailure = error;
  }

  /**
   * Make every updateStatus() call for this order reject with the given error
   */
  failUpdateFor(orderId: Exclude<OrderId, null>, error: Error): void {
    this.updateFailures.set(String(orderId), error);
  }

  getOrder(orderId: Exclude<OrderId, null>): StoredOrder | undefined {
    return this.orders.get(String(orderId));
  }

  getFetchCalls(): UserId[] {
    return [...this.fetchCalls];
  }

  getUpdateCalls(): UpdateCall[] {
    return [...this.updateCalls];
  }

  isClosed(): boolean {
    return this.closed;
  }

  /**
   * Clear all data (for testing)
   */
  clear(): void {
    this.orders.clear();
    this.updateFailures.clear();
    this.fetchFailure = null;
    this.fetchCalls = [];
    this.updateCalls = [];
    this.idCounter = 0;
  }
}

/**
 * Mock storage configuration options
 */
export interface MockStorageOptions {
  simulateLatency?: boolean;
  latencyMs?: number;
  throwOnError?: boolean;
}
