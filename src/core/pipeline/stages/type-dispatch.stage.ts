import { OrderStatus, OrderType } from '../../domain/enums';
import { assertNever } from '../../state-machine';
import {
  HandlerOutcome,
  OrderContext,
  OrderHandler,
  PipelineStage,
  StageResult,
} from '../types';

/**
 * Handlers for the three known order types
 */
export interface TypeHandlers {
  [OrderType.A]: OrderHandler;
  [OrderType.B]: OrderHandler;
  [OrderType.C]: OrderHandler;
}

/**
 * Stage 1: Type Dispatch
 * Routes the order to the handler for its variant and applies the resulting status
 */
export class TypeDispatchStage implements PipelineStage {
  name = 'type-dispatch';

  constructor(private readonly handlers: TypeHandlers) {}

  async execute(context: OrderContext): Promise<StageResult> {
    const outcome = await this.dispatch(context);

    context.order.status = outcome.status;
    if (outcome.error) {
      context.recoveredError = outcome.error;
    }

    return { context, shouldContinue: true };
  }

  private async dispatch(context: OrderContext): Promise<HandlerOutcome> {
    const variant = context.variant;

    switch (variant.kind) {
      case OrderType.A:
        return this.handlers[OrderType.A].handle(variant.order);
      case OrderType.B:
        return this.handlers[OrderType.B].handle(variant.order);
      case OrderType.C:
        return this.handlers[OrderType.C].handle(variant.order);
      case 'unknown':
        return { status: OrderStatus.UNKNOWN_TYPE };
      default:
        return assertNever(variant);
    }
  }
}
