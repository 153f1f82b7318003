import { OrderStatus } from '../../domain/enums';
import {
  Logger,
  OrderStorageAdapter,
  PersistenceError,
} from '../../interfaces';
import { OrderContext, PipelineStage, StageResult } from '../types';

/**
 * Stage 3: Persist
 * Saves status and priority; a PersistenceError downgrades the order to db_error,
 * any other fault aborts the batch
 */
export class PersistStage implements PipelineStage {
  name = 'persist';

  constructor(
    private readonly storageAdapter: OrderStorageAdapter,
    private readonly logger: Logger,
  ) {}

  async execute(context: OrderContext): Promise<StageResult> {
    const { order } = context;

    try {
      await this.storageAdapter.updateStatus(
        order.id,
        order.status,
        order.priority,
      );
    } catch (error) {
      if (!(error instanceof PersistenceError)) {
        throw error;
      }

      this.logger.warn(
        `Could not persist order ${order.id} as ${order.status} (${error.code}): ${error.message}`,
      );
      order.status = OrderStatus.DB_ERROR;
      context.recoveredError = error;

      return { context, shouldContinue: false };
    }

    return {
      context,
      shouldContinue: false, // Last stage
    };
  }
}
