import { DataSource, QueryFailedError, Repository, UpdateResult } from 'typeorm';
import {
  OrderStorageAdapter,
  PersistenceError,
  Order,
  OrderId,
  OrderPriority,
  OrderStatus,
  UserId,
} from '../../../core';
import { OrderEntity } from './entities';

/**
 * TypeORM implementation of OrderStorageAdapter
 *
 * Any failure to load orders surfaces as PersistenceError. On update, query
 * failures, unknown ids and ids that are not integers surface as
 * PersistenceError; connection and driver faults are passed through.
 */
export class TypeORMStorageAdapter implements OrderStorageAdapter {
  private orderRepo: Repository<OrderEntity>;

  constructor(private readonly dataSource: DataSource) {
    this.orderRepo = dataSource.getRepository(OrderEntity);
  }

  /**
   * Pending (status NEW) orders of the user, oldest first
   */
  async fetchOrdersForUser(userId: UserId): Promise<Order[]> {
    let entities: OrderEntity[];

    try {
      entities = await this.orderRepo.find({
        where: { userId, status: OrderStatus.NEW },
        order: { id: 'ASC' },
      });
    } catch (error) {
      throw new PersistenceError(
        `Failed to load orders of user ${userId}: ${error instanceof Error ? error.message : String(error)}`,
        'QUERY_FAILED',
        undefined,
        error instanceof Error ? error : undefined,
      );
    }

    return entities.map((entity) => this.mapOrderEntityToDomain(entity));
  }

  async updateStatus(
    orderId: OrderId,
    status: OrderStatus,
    priority: OrderPriority,
  ): Promise<void> {
    const id = this.toEntityId(orderId);
    let result: UpdateResult;

    try {
      result = await this.orderRepo.update({ id }, { status, priority });
    } catch (error) {
      if (error instanceof QueryFailedError) {
        throw new PersistenceError(
          `Failed to update order ${orderId}: ${error.message}`,
          'QUERY_FAILED',
          orderId,
          error,
        );
      }
      throw error;
    }

    if (result.affected === 0) {
      throw new PersistenceError(
        `Order not found: ${orderId}`,
        'ORDER_NOT_FOUND',
        orderId,
      );
    }
  }

  async isHealthy(): Promise<boolean> {
    try {
      await this.dataSource.query('SELECT 1');
      return true;
    } catch (error) {
      return false;
    }
  }

  async close(): Promise<void> {
    if (this.dataSource.isInitialized) {
      await this.dataSource.destroy();
    }
  }

  private toEntityId(orderId: OrderId): number {
    if (orderId === null) {
      throw new PersistenceError(
        'Cannot update an order without an identifier',
        'MISSING_ORDER_ID',
        orderId,
      );
    }

    const id = typeof orderId === 'number' ? orderId : Number(orderId);
    if (!Number.isInteger(id)) {
      throw new PersistenceError(
        `Invalid order identifier: ${orderId}`,
        'INVALID_ORDER_ID',
        orderId,
      );
    }

    return id;
  }

  /**
   * Orders are always handed out fresh: status NEW, priority LOW
   */
  private mapOrderEntityToDomain(entity: OrderEntity): Order {
    return new Order(entity.id, entity.type, entity.amount, entity.flag);
  }
}
