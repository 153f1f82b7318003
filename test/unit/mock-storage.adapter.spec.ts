import {
  MockOrderFactory,
  MockStorageAdapter,
  OrderPriority,
  OrderStatus,
  PersistenceError,
} from '../../src/testing';

describe('MockStorageAdapter', () => {
  let adapter: MockStorageAdapter;

  beforeEach(() => {
    adapter = new MockStorageAdapter();
  });

  it('should return fresh orders of the user in seed order', async () => {
    adapter.seedOrders(1, [
      MockOrderFactory.typeA({ amount: 10 }),
      MockOrderFactory.typeB({ amount: 20 }),
    ]);
    adapter.seedOrders(2, [MockOrderFactory.typeC()]);

    const orders = await adapter.fetchOrdersForUser(1);

    expect(orders.map((o) => [o.id, o.type, o.amount])).toEqual([
      [1, 'A', 10],
      [2, 'B', 20],
    ]);
    expect(orders.every((o) => o.status === OrderStatus.NEW)).toBe(true);
    expect(adapter.getFetchCalls()).toEqual([1]);
  });

  it('should only hand out orders that are still new', async () => {
    adapter.seedOrders(1, [
      { type: 'A', status: OrderStatus.EXPORTED },
      { type: 'C' },
    ]);

    const orders = await adapter.fetchOrdersForUser(1);

    expect(orders.map((o) => o.id)).toEqual([2]);
  });

  it('should persist status and priority', async () => {
    adapter.seedOrders(1, [MockOrderFactory.typeC({ id: 10 })]);

    await adapter.updateStatus(10, OrderStatus.COMPLETED, OrderPriority.HIGH);

    expect(adapter.getOrder(10)).toMatchObject({
      status: OrderStatus.COMPLETED,
      priority: OrderPriority.HIGH,
    });
    expect(adapter.getUpdateCalls()).toEqual([
      { orderId: 10, status: OrderStatus.COMPLETED, priority: OrderPriority.HIGH },
    ]);
  });

  it('should reject updates of unknown orders', async () => {
    await expect(
      adapter.updateStatus(99, OrderStatus.COMPLETED, OrderPriority.LOW),
    ).rejects.toMatchObject({ code: 'ORDER_NOT_FOUND', orderId: 99 });
  });

  it('should reject updates without an id', async () => {
    await expect(
      adapter.updateStatus(null, OrderStatus.UNKNOWN_TYPE, OrderPriority.LOW),
    ).rejects.toBeInstanceOf(PersistenceError);
  });

  it('should fail the next fetch once', async () => {
    const failure = new Error('connection refused');
    adapter.failNextFetch(failure);

    await expect(adapter.fetchOrdersForUser(1)).rejects.toBe(failure);
    await expect(adapter.fetchOrdersForUser(1)).resolves.toEqual([]);
  });

  it('should fail every update of an order when told to', async () => {
    adapter.seedOrders(1, [MockOrderFactory.typeC({ id: 10 })]);
    const failure = new PersistenceError('deadlock', 'QUERY_FAILED', 10);
    adapter.failUpdateFor(10, failure);

    await expect(
      adapter.updateStatus(10, OrderStatus.COMPLETED, OrderPriority.LOW),
    ).rejects.toBe(failure);
    expect(adapter.getOrder(10)?.status).toBe(OrderStatus.NEW);
  });

  it('should report health from its options', async () => {
    expect(await adapter.isHealthy()).toBe(true);
    expect(await new MockStorageAdapter({ throwOnError: true }).isHealthy()).toBe(
      false,
    );
  });
});
