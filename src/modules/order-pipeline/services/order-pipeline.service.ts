import { Inject, Injectable, Logger } from '@nestjs/common';
import { isFailureStatus } from '../../../core';
import type {
  OrderProcessor,
  OrderSnapshot,
  OrderStorageAdapter,
  PipelineStatistics,
  UserId,
} from '../../../core';
import { ORDER_PROCESSOR, STORAGE_ADAPTER } from '../constants';

/**
 * Result of one processing run for a user
 */
export interface ProcessingSummary {
  userId: UserId;
  total: number;
  failed: number;
  statusCounts: Record<string, number>;
  orders: OrderSnapshot[];
}

/**
 * OrderPipelineService
 *
 * Main service providing high-level pipeline operations
 */
@Injectable()
export class OrderPipelineService {
  private readonly logger = new Logger(OrderPipelineService.name);

  constructor(
    @Inject(ORDER_PROCESSOR)
    private readonly orderProcessor: OrderProcessor,
    @Inject(STORAGE_ADAPTER)
    private readonly storageAdapter: OrderStorageAdapter,
  ) {}

  /**
   * Process every pending order of a user
   * Rejects with the original error when the batch aborts
   */
  async processOrdersForUser(userId: UserId): Promise<ProcessingSummary> {
    const orders = await this.orderProcessor.processAll(userId);

    const statusCounts: Record<string, number> = {};
    for (const order of orders) {
      statusCounts[order.status] = (statusCounts[order.status] ?? 0) + 1;
    }

    this.logger.log(
      `Processed ${orders.length} order(s) for user ${userId}: ${JSON.stringify(statusCounts)}`,
    );

    return {
      userId,
      total: orders.length,
      failed: orders.filter((order) => isFailureStatus(order.status)).length,
      statusCounts,
      orders: orders.map((order) => order.toSnapshot()),
    };
  }

  /**
   * Check storage connectivity
   */
  async isStorageHealthy(): Promise<boolean> {
    return this.storageAdapter.isHealthy();
  }

  /**
   * Get pipeline statistics
   */
  getStatistics(): PipelineStatistics {
    return this.orderProcessor.getStatistics();
  }
}
