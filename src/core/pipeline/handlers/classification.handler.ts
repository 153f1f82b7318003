import { ClassificationResponse, Order } from '../../domain/models';
import { OrderStatus } from '../../domain/enums';
import {
  ClassificationAdapter,
  ClassificationError,
  Logger,
} from '../../interfaces';
import { deriveClassifiedStatus } from '../../state-machine';
import { HandlerOutcome, OrderHandler } from '../types';

/**
 * Type B: status from the remote classification service
 *
 * - ClassificationError  -> api_failure
 * - non-success envelope -> api_error
 * - success              -> deriveClassifiedStatus()
 *
 * Any other rejection from the adapter is not absorbed.
 */
export class ClassificationHandler implements OrderHandler {
  readonly name = 'classification';

  constructor(
    private readonly classificationAdapter: ClassificationAdapter,
    private readonly logger: Logger,
  ) {}

  async handle(order: Order): Promise<HandlerOutcome> {
    let response: ClassificationResponse;

    try {
      response = await this.classificationAdapter.classify(order.id);
    } catch (error) {
      if (error instanceof ClassificationError) {
        this.logger.warn(
          `Classification failed for order ${order.id} (${error.code}): ${error.message}`,
        );
        return { status: OrderStatus.API_FAILURE, error };
      }
      throw error;
    }

    if (!response.isSuccess()) {
      this.logger.warn(
        `Classification returned status '${response.status}' for order ${order.id}`,
      );
      return { status: OrderStatus.API_ERROR };
    }

    return { status: deriveClassifiedStatus(order, response.data) };
  }
}
