import { DataSource, Repository } from 'typeorm';
import {
  OrderEntity,
  OrderPriority,
  OrderStatus,
  PersistenceError,
  TypeORMStorageAdapter,
} from '../../src';

describe('TypeORM Storage Adapter Integration Tests', () => {
  let dataSource: DataSource;
  let adapter: TypeORMStorageAdapter;
  let repo: Repository<OrderEntity>;

  beforeAll(async () => {
    // In-process database with the same entity metadata
    dataSource = new DataSource({
      type: 'sqljs',
      autoSave: false,
      entities: [OrderEntity],
      synchronize: true,
      logging: false,
    });

    await dataSource.initialize();
    adapter = new TypeORMStorageAdapter(dataSource);
    repo = dataSource.getRepository(OrderEntity);
  });

  afterAll(async () => {
    await dataSource.destroy();
  });

  beforeEach(async () => {
    await repo.clear();
  });

  const insert = (values: Partial<OrderEntity>): Promise<OrderEntity> =>
    repo.save(repo.create({ userId: 1, ...values }));

  describe('Order Operations', () => {
    it('should fetch the pending orders of a user by ascending id', async () => {
      const first = await insert({ type: 'A', amount: 250, flag: false });
      const second = await insert({ type: 'B', amount: 80, flag: true });
      await insert({ type: 'C', amount: 10, status: OrderStatus.COMPLETED });
      await insert({ userId: 2, type: 'C', amount: 10 });

      const orders = await adapter.fetchOrdersForUser(1);

      expect(orders.map((o) => o.toSnapshot())).toEqual([
        {
          id: first.id,
          type: 'A',
          amount: 250,
          flag: false,
          status: OrderStatus.NEW,
          priority: OrderPriority.LOW,
        },
        {
          id: second.id,
          type: 'B',
          amount: 80,
          flag: true,
          status: OrderStatus.NEW,
          priority: OrderPriority.LOW,
        },
      ]);
    });

    it('should keep missing fields as null', async () => {
      await insert({ type: null, amount: null, flag: null });

      const [order] = await adapter.fetchOrdersForUser(1);

      expect(order.type).toBeNull();
      expect(order.amount).toBeNull();
      expect(order.flag).toBeNull();
    });

    it('should return an empty list when nothing is pending', async () => {
      await expect(adapter.fetchOrdersForUser(42)).resolves.toEqual([]);
    });

    it('should persist status and priority', async () => {
      const entity = await insert({ type: 'C', amount: 300, flag: true });

      await adapter.updateStatus(
        entity.id,
        OrderStatus.COMPLETED,
        OrderPriority.HIGH,
      );

      const stored = await repo.findOneByOrFail({ id: entity.id });
      expect(stored.status).toBe(OrderStatus.COMPLETED);
      expect(stored.priority).toBe(OrderPriority.HIGH);
      await expect(adapter.fetchOrdersForUser(1)).resolves.toEqual([]);
    });

    it('should accept numeric string ids', async () => {
      const entity = await insert({ type: 'C' });

      await adapter.updateStatus(
        String(entity.id),
        OrderStatus.IN_PROGRESS,
        OrderPriority.LOW,
      );

      const stored = await repo.findOneByOrFail({ id: entity.id });
      expect(stored.status).toBe(OrderStatus.IN_PROGRESS);
    });
  });

  describe('Persistence Errors', () => {
    it('should reject unknown ids with ORDER_NOT_FOUND', async () => {
      await expect(
        adapter.updateStatus(999, OrderStatus.COMPLETED, OrderPriority.LOW),
      ).rejects.toMatchObject({ code: 'ORDER_NOT_FOUND', orderId: 999 });
    });

    it('should reject a missing id with MISSING_ORDER_ID', async () => {
      await expect(
        adapter.updateStatus(null, OrderStatus.UNKNOWN_TYPE, OrderPriority.LOW),
      ).rejects.toMatchObject({ code: 'MISSING_ORDER_ID' });
    });

    it('should reject ids that are not integers', async () => {
      await expect(
        adapter.updateStatus('abc', OrderStatus.COMPLETED, OrderPriority.LOW),
      ).rejects.toBeInstanceOf(PersistenceError);
    });

    it('should reject a failed load with QUERY_FAILED', async () => {
      await dataSource.query('DROP TABLE "orders"');

      try {
        const load = adapter.fetchOrdersForUser(1);
        await expect(load).rejects.toBeInstanceOf(PersistenceError);
        await expect(load).rejects.toMatchObject({ code: 'QUERY_FAILED' });
      } finally {
        await dataSource.synchronize();
      }
    });
  });

  describe('Health Check', () => {
    it('should report healthy when database is accessible', async () => {
      expect(await adapter.isHealthy()).toBe(true);
    });
  });

  describe('Close', () => {
    it('should destroy the data source once', async () => {
      const ownSource = new DataSource({
        type: 'sqljs',
        autoSave: false,
        entities: [OrderEntity],
        synchronize: true,
      });
      await ownSource.initialize();
      const ownAdapter = new TypeORMStorageAdapter(ownSource);

      await ownAdapter.close();
      await ownAdapter.close();

      expect(ownSource.isInitialized).toBe(false);
    });
  });
});
