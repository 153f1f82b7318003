import { v4 as uuidv4 } from 'uuid';
import { Order } from '../domain/models';
import { OrderType } from '../domain/enums';
import {
  ClassificationAdapter,
  ErrorContext,
  ExportSink,
  LifecycleHooks,
  Logger,
  OrderStorageAdapter,
  UserId,
  consoleLogger,
} from '../interfaces';
import { toOrderVariant } from '../state-machine';
import { CsvFileSink } from '../../adapters/sinks/csv/csv-file.sink';
import {
  OrderContext,
  PipelineConfig,
  PipelineStage,
  PipelineStatistics,
} from './types';
import { TypeDispatchStage, TypeHandlers } from './stages/type-dispatch.stage';
import { PriorityStage } from './stages/priority.stage';
import { PersistStage } from './stages/persist.stage';
import { CsvExportHandler } from './handlers/csv-export.handler';
import { ClassificationHandler } from './handlers/classification.handler';
import { FlagHandler } from './handlers/flag.handler';

/**
 * OrderProcessor runs every pending order of a user through the pipeline
 *
 * Pipeline stages, per order and strictly in fetch order:
 * 1. Type Dispatch - status from the type-specific handler
 * 2. Priority - priority from the amount
 * 3. Persist - save status and priority, db_error on PersistenceError
 *
 * A fetch fault, or any fault that is not absorbed into an order status,
 * rejects processAll() with the original error.
 */
export class OrderProcessor {
  private readonly storageAdapter: OrderStorageAdapter;
  private readonly classificationAdapter: ClassificationAdapter;
  private readonly exportSink: ExportSink;
  private readonly handlers: TypeHandlers;
  private readonly stages: PipelineStage[];
  private readonly hooks?: LifecycleHooks;
  private readonly logger: Logger;
  private readonly debug: boolean;

  constructor(config: PipelineConfig) {
    this.storageAdapter = config.storageAdapter;
    this.classificationAdapter = config.classificationAdapter;
    this.hooks = config.hooks;
    this.logger = config.logger ?? consoleLogger;
    this.debug = config.debug ?? false;

    this.exportSink =
      config.exportSink ??
      new CsvFileSink({ directory: config.exportDirectory });

    this.handlers = {
      [OrderType.A]: new CsvExportHandler(this.exportSink, this.logger, config.clock),
      [OrderType.B]: new ClassificationHandler(this.classificationAdapter, this.logger),
      [OrderType.C]: new FlagHandler(),
    };

    this.stages = this.initializeStages();
  }

  /**
   * Process all pending orders of a user
   * @returns The loaded orders, mutated in place, in fetch order
   */
  async processAll(userId: UserId): Promise<Order[]> {
    const batchId = uuidv4();
    let orders: Order[];

    try {
      orders = await this.storageAdapter.fetchOrdersForUser(userId);
    } catch (error) {
      await this.reportError(error, { operation: 'fetch-orders', userId });
      throw error;
    }

    this.logger.log(
      `Processing ${orders.length} order(s) for user ${userId} [${batchId}]`,
    );

    for (const order of orders) {
      await this.processOrder(userId, order, batchId);
    }

    this.logger.log(`Finished batch ${batchId} for user ${userId}`);
    return orders;
  }

  /**
   * Run one order through every stage
   */
  private async processOrder(
    userId: UserId,
    order: Order,
    batchId: string,
  ): Promise<void> {
    let context: OrderContext = {
      userId,
      order,
      variant: toOrderVariant(order),
      batchId,
      startTime: new Date(),
    };

    for (const stage of this.stages) {
      try {
        const result = await stage.execute(context);
        context = result.context;

        if (!result.shouldContinue) {
          break;
        }
      } catch (error) {
        await this.reportError(error, {
          operation: 'process-order',
          userId,
          orderId: order.id,
          stage: stage.name,
        });
        throw error;
      }
    }

    const latencyMs = Date.now() - context.startTime.getTime();
    if (this.debug) {
      this.logger.debug(
        `Order ${order.id} (${context.variant.kind}) -> ${order.status}/${order.priority} in ${latencyMs}ms`,
      );
    }

    if (!this.hooks?.onOrderProcessed) {
      return;
    }

    // Hook failures are logged, not rethrown
    try {
      await this.hooks.onOrderProcessed({
        userId,
        orderId: order.id,
        type: order.type,
        status: order.status,
        priority: order.priority,
        latencyMs,
        recoveredError: context.recoveredError,
      });
    } catch (hookError) {
      this.logger.error(`onOrderProcessed hook failed for order ${order.id}`, hookError);
    }
  }

  /**
   * Log a batch-fatal fault and notify the error hook
   * The caller rethrows the original error
   */
  private async reportError(
    error: unknown,
    context: ErrorContext,
  ): Promise<void> {
    const normalized = error instanceof Error ? error : new Error(String(error));

    this.logger.error(
      `Order batch for user ${context.userId} aborted during ${context.stage ?? context.operation}: ${normalized.message}`,
    );

    if (!this.hooks?.onError) {
      return;
    }

    try {
      await this.hooks.onError(normalized, context);
    } catch (hookError) {
      this.logger.error('onError hook failed', hookError);
    }
  }

  /**
   * Initialize pipeline stages
   */
  private initializeStages(): PipelineStage[] {
    return [
      new TypeDispatchStage(this.handlers),
      new PriorityStage(),
      new PersistStage(this.storageAdapter, this.logger),
    ];
  }

  /**
   * Get pipeline statistics
   */
  getStatistics(): PipelineStatistics {
    return {
      stages: this.stages.map((s) => s.name),
      handlers: Object.values(this.handlers).map((h) => h.name),
      exportSink: this.exportSink.constructor.name,
      classificationAdapter: this.classificationAdapter.adapterName,
    };
  }
}
